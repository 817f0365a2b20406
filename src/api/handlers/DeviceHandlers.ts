/**
 * DeviceHandlers - instrument status, simulated instrument control and
 * live data.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { OscilloscopeManager } from '../../devices/OscilloscopeManager.js';
import type { SignalGeneratorManager } from '../../devices/SignalGeneratorManager.js';
import type { DeviceStatus, OscilloscopeData, SignalGeneratorData } from '../../devices/types.js';
import type { AppContext } from '../../server.js';
import { errorReply, notFound } from '../errors.js';
import type { ApiError, DeviceListResponse } from '../types.js';

const SetMockStateSchema = z.object({ killed: z.boolean() });

const DataQuerySchema = z.object({
  channel: z.enum(['1', '2']).default('1'),
});

type DeviceParams = { Params: { id: string } };

export function createDeviceHandlers(ctx: AppContext) {
  function findManager(id: string): SignalGeneratorManager | OscilloscopeManager | undefined {
    const wanted = id.toLowerCase();
    return [ctx.signalGenerator, ctx.oscilloscope].find((manager) => manager.deviceId === wanted);
  }

  function unknownDevice(reply: FastifyReply, id: string): ApiError {
    return notFound(reply, 'DEVICE_NOT_FOUND', `Unknown device: ${id}`);
  }

  return {
    /**
     * GET /devices
     */
    async listDevices(_request: FastifyRequest, reply: FastifyReply): Promise<DeviceListResponse | ApiError> {
      try {
        return {
          devices: [await ctx.signalGenerator.status(), await ctx.oscilloscope.status()],
        };
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * GET /devices/:id
     */
    async getDevice(request: FastifyRequest<DeviceParams>, reply: FastifyReply): Promise<DeviceStatus | ApiError> {
      const manager = findManager(request.params.id);
      if (!manager) return unknownDevice(reply, request.params.id);
      try {
        await manager.refreshLiveness();
        return await manager.status();
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * PUT /devices/:id/mock
     * Kill or revive a simulated instrument.
     */
    async setMockState(
      request: FastifyRequest<DeviceParams & { Body: unknown }>,
      reply: FastifyReply
    ): Promise<DeviceStatus | ApiError> {
      const manager = findManager(request.params.id);
      if (!manager) return unknownDevice(reply, request.params.id);
      if (!manager.hardwareMock) {
        reply.status(409);
        return { error: 'NOT_MOCK_MODE', message: `${manager.idn} is not running in mock mode` };
      }
      try {
        const body = SetMockStateSchema.parse(request.body);
        await manager.setMockKilled(body.killed);
        return await manager.status();
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * GET /devices/:id/data
     * Signal generator channel settings, or the oscilloscope's buffered
     * samples for `?channel=1|2`.
     */
    async getDeviceData(
      request: FastifyRequest<DeviceParams & { Querystring: unknown }>,
      reply: FastifyReply
    ): Promise<{ deviceId: string; data: SignalGeneratorData | OscilloscopeData } | ApiError> {
      const manager = findManager(request.params.id);
      if (!manager) return unknownDevice(reply, request.params.id);
      try {
        let data: SignalGeneratorData | OscilloscopeData | null;
        if (manager === ctx.oscilloscope) {
          const query = DataQuerySchema.parse(request.query);
          data = await ctx.oscilloscope.getData(query.channel === '2' ? 2 : 1);
        } else {
          data = await ctx.signalGenerator.getData();
        }
        if (!data) {
          reply.status(503);
          return { error: 'DEVICE_ABSENT', message: `${manager.idn} is not available` };
        }
        return { deviceId: manager.deviceId, data };
      } catch (err) {
        return errorReply(reply, err);
      }
    },
  };
}

export type DeviceHandlers = ReturnType<typeof createDeviceHandlers>;
