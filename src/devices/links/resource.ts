/**
 * VISA-style resource strings.
 *
 * Only raw socket resources are reachable: `TCPIP[board]::<host>::<port>::SOCKET`.
 */

export interface SocketResource {
  host: string;
  port: number;
}

const SOCKET_RESOURCE = /^TCPIP\d*::([^:]+)::(\d+)::SOCKET$/i;

export function parseSocketResource(resource: string): SocketResource | null {
  const match = SOCKET_RESOURCE.exec(resource.trim());
  if (!match) return null;
  const host = match[1];
  const port = Number.parseInt(match[2] ?? '', 10);
  if (host === undefined || !Number.isInteger(port) || port < 1 || port > 65535) {
    return null;
  }
  return { host, port };
}
