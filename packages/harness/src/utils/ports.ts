import { PORTS } from '../constants.js';

// Wide random base to reduce collisions with parallel CI jobs
let nextPort = PORTS.BASE_PORT + Math.floor(Math.random() * PORTS.PORT_RANGE);
const allocatedPorts = new Set<number>();

/**
 * Hand out a port that is not held by another node of this test run
 */
export function allocatePort(): number {
  let port = nextPort++;
  while (allocatedPorts.has(port)) {
    port = nextPort++;
  }
  allocatedPorts.add(port);
  return port;
}

export function releasePort(port: number): void {
  allocatedPorts.delete(port);
}

export function isPortAllocated(port: number): boolean {
  return allocatedPorts.has(port);
}
