/**
 * Handler exports for the API layer.
 */

export * from './DeviceHandlers.js';
export * from './TaskHandlers.js';
export * from './JobHandlers.js';
