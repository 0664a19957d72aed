/**
 * PacketSink interface
 */

/**
 * Destination for flushed packets. Each `write` is one transport-level
 * packet; the sink owns whatever connection or stream sits underneath.
 */
export interface PacketSink {
  /**
   * Send one packet. The sink must not retain `packet` past the returned promise.
   */
  write(packet: Buffer): Promise<void>;

  /**
   * Release the underlying connection or stream
   */
  close(): Promise<void>;
}
