import { describe, expect, it } from 'vitest';
import { DeviceDetector, type ResourceProvider } from './DeviceDetector.js';
import type { InstrumentLink } from './types.js';

class FakeLink implements InstrumentLink {
  closed = false;

  constructor(readonly resource: string, private readonly idn: string | Error) {}

  async query(): Promise<string> {
    if (this.idn instanceof Error) throw this.idn;
    return this.idn;
  }

  async write(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }
}

function providerFor(links: Record<string, FakeLink | Error>): ResourceProvider & { opened: string[] } {
  const opened: string[] = [];
  return {
    opened,
    async listResources() {
      return Object.keys(links);
    },
    async open(resource) {
      opened.push(resource);
      const link = links[resource];
      if (link === undefined) throw new Error(`unknown resource ${resource}`);
      if (link instanceof Error) throw link;
      return link;
    },
  };
}

describe('DeviceDetector', () => {
  it('returns the first resource whose identification matches', async () => {
    const scope = new FakeLink('TCPIP::10.0.0.2::5025::SOCKET', 'KEYSIGHT TECHNOLOGIES,EDUX1002A,CN1,1');
    const generator = new FakeLink('TCPIP::10.0.0.3::5555::SOCKET', 'Rigol Technologies,DG4202,DG4E1,1');
    const detector = new DeviceDetector(providerFor({ [scope.resource]: scope, [generator.resource]: generator }));

    const found = await detector.detect('DG4202');

    expect(found).toBe(generator);
    expect(scope.closed).toBe(true);
    expect(generator.closed).toBe(false);
  });

  it('skips resources that are not TCPIP', async () => {
    const usb = new FakeLink('USB0::0x1AB1::0x0641::DG4E1::INSTR', 'Rigol Technologies,DG4202,DG4E1,1');
    const provider = providerFor({ [usb.resource]: usb });

    expect(await new DeviceDetector(provider).detect('DG4202')).toBeNull();
    expect(provider.opened).toEqual([]);
  });

  it('moves past resources that fail to open or to answer', async () => {
    const silent = new FakeLink('TCPIP::10.0.0.4::5555::SOCKET', new Error('timeout'));
    const good = new FakeLink('TCPIP::10.0.0.5::5555::SOCKET', 'Rigol Technologies,DG4202,DG4E1,1');
    const provider = providerFor({
      'TCPIP::10.0.0.1::5555::SOCKET': new Error('ECONNREFUSED'),
      [silent.resource]: silent,
      [good.resource]: good,
    });

    expect(await new DeviceDetector(provider).detect('DG4202')).toBe(good);
    expect(silent.closed).toBe(true);
  });

  it('returns null when nothing matches', async () => {
    expect(await new DeviceDetector(providerFor({})).detect('DG4202')).toBeNull();
  });
});
