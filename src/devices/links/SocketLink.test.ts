import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createServer, type Server, type Socket } from 'node:net';
import { SocketLink } from './SocketLink.js';
import { LinkError } from '../../core/errors.js';

describe('SocketLink', () => {
  let server: Server;
  let resource: string;
  let received: string[];
  const clients = new Set<Socket>();

  beforeEach(async () => {
    received = [];
    server = createServer((socket) => {
      clients.add(socket);
      socket.on('close', () => clients.delete(socket));
      socket.on('error', () => socket.destroy());
      let pending = '';
      socket.setEncoding('utf-8');
      socket.on('data', (chunk: string) => {
        pending += chunk;
        let newline = pending.indexOf('\n');
        while (newline >= 0) {
          const command = pending.slice(0, newline);
          pending = pending.slice(newline + 1);
          received.push(command);
          if (command === '*IDN?') socket.write('TEST,INSTRUMENT,0,1\r\n');
          if (command === ':OUTPut1:STATe?') socket.write('OFF\r\n');
          if (command === ':SLOW?') {
            setTimeout(() => {
              if (socket.writable) socket.write('LATE,REPLY\r\n');
            }, 150);
          }
          newline = pending.indexOf('\n');
        }
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    resource = `TCPIP::127.0.0.1::${address.port}::SOCKET`;
  });

  afterEach(async () => {
    for (const socket of clients) socket.destroy();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('answers a query with one line, without the terminator', async () => {
    const link = await SocketLink.open(resource);
    expect(await link.query('*IDN?')).toBe('TEST,INSTRUMENT,0,1');
    await link.close();
  });

  it('sends writes in order ahead of later queries', async () => {
    const link = await SocketLink.open(resource);
    await link.write(':OUTPut1:STATe ON');
    await link.query('*IDN?');

    expect(received).toEqual([':OUTPut1:STATe ON', '*IDN?']);
    await link.close();
  });

  it('closes the link when a query gets no answer in time', async () => {
    const link = await SocketLink.open(resource, { timeoutMs: 100 });

    await expect(link.query(':SILENT?')).rejects.toThrow(`${resource}: no response to ':SILENT?' within 100ms`);
    await expect(link.query('*IDN?')).rejects.toBeInstanceOf(LinkError);
    await link.close();
  });

  it('never hands a late reply to the next query', async () => {
    const link = await SocketLink.open(resource, { timeoutMs: 100 });

    await expect(link.query(':SLOW?')).rejects.toThrow("no response to ':SLOW?' within 100ms");
    await new Promise((resolve) => setTimeout(resolve, 100));
    await expect(link.query(':OUTPut1:STATe?')).rejects.toThrow("no response to ':SLOW?' within 100ms");

    const fresh = await SocketLink.open(resource, { timeoutMs: 100 });
    expect(await fresh.query(':OUTPut1:STATe?')).toBe('OFF');
    await fresh.close();
  });

  it('rejects commands after close', async () => {
    const link = await SocketLink.open(resource);
    await link.close();

    await expect(link.write('*RST')).rejects.toThrow('closed by client');
  });

  it('rejects resources that are not sockets', async () => {
    await expect(SocketLink.open('USB0::1::2::INSTR')).rejects.toBeInstanceOf(LinkError);
  });
});
