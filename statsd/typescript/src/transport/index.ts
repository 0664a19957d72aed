/**
 * Transport module exports
 */

export type { PacketSink } from './sink';
export { UdpSink, connectUdp } from './udp';
export type { DatagramSocket } from './udp';
export { WritableSink } from './writable';
export { parseAddress } from './address';
export type { CollectorAddress } from './address';
