/**
 * Hardware discovery: open each configured resource, ask `*IDN?`, keep the
 * first whose identification contains the wanted string.
 */

import { errorMessage } from '../core/errors.js';
import { createLogger } from '../logging/logger.js';
import { SocketLink } from './links/SocketLink.js';
import type { InstrumentLink } from './types.js';

const log = createLogger('device-detector');

/**
 * Source of candidate resources and the means to open them.
 */
export interface ResourceProvider {
  listResources(): Promise<string[]>;
  open(resource: string): Promise<InstrumentLink>;
}

/**
 * Resources come from configuration and are opened as raw TCP sockets.
 */
export function createSocketResourceProvider(resources: readonly string[], timeoutMs: number): ResourceProvider {
  return {
    async listResources() {
      return [...resources];
    },
    open(resource) {
      return SocketLink.open(resource, { timeoutMs });
    },
  };
}

export class DeviceDetector {
  constructor(private readonly provider: ResourceProvider) {}

  async detect(idnMatch: string): Promise<InstrumentLink | null> {
    const resources = await this.provider.listResources();

    for (const resource of resources) {
      if (!/^TCPIP/i.test(resource)) {
        log.debug({ resource }, 'Skipping non-TCPIP resource');
        continue;
      }

      let link: InstrumentLink;
      try {
        link = await this.provider.open(resource);
      } catch (err) {
        log.debug({ resource, err: errorMessage(err) }, 'Could not open resource');
        continue;
      }

      try {
        const idn = await link.query('*IDN?');
        if (idn.includes(idnMatch)) {
          log.info({ resource, idn }, 'Instrument detected');
          return link;
        }
      } catch (err) {
        log.debug({ resource, err: errorMessage(err) }, 'Identification query failed');
      }

      await link.close().catch((err: unknown) => {
        log.debug({ resource, err: errorMessage(err) }, 'Error closing probed resource');
      });
    }

    return null;
  }
}
