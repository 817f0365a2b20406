import { describe, expect, it } from 'vitest';
import { parseSocketResource } from './resource.js';

describe('parseSocketResource', () => {
  it('parses host and port', () => {
    expect(parseSocketResource('TCPIP::192.168.1.20::5555::SOCKET')).toEqual({ host: '192.168.1.20', port: 5555 });
  });

  it('accepts a board number and lower case', () => {
    expect(parseSocketResource('tcpip0::scope.lab::5025::socket')).toEqual({ host: 'scope.lab', port: 5025 });
  });

  it('rejects resources that are not raw sockets', () => {
    expect(parseSocketResource('TCPIP::192.168.1.20::INSTR')).toBeNull();
    expect(parseSocketResource('USB0::0x1AB1::0x0641::DG4E000000001::INSTR')).toBeNull();
  });

  it('rejects out of range ports', () => {
    expect(parseSocketResource('TCPIP::host::70000::SOCKET')).toBeNull();
  });
});
