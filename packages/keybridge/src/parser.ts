/**
 * Wire format of the bridge's Socket.IO traffic.
 *
 * Every packet (device samples from readers, lock-key mode reports and the key
 * press/release events sent to injectors) travels as one superjson text frame.
 * Readers and injectors must pass the same parser to their client socket as the
 * host passes to its server, or packets are dropped on arrival.
 *
 * @example
 * ```ts
 * const io = new Server({ parser: bridgeParser });
 * const socket = io(url, { parser: bridgeParser });
 * ```
 */

import { Emitter } from "@socket.io/component-emitter";
import superjson from "superjson";

interface DecoderEvents {
  decoded: (packet: unknown) => void;
}

/**
 * Writes a packet as a single text frame. Bridge payloads carry no binary
 * attachments, so there is never a second chunk.
 */
class Encoder {
  encode(packet: unknown): string[] {
    return [superjson.stringify(packet)];
  }
}

/**
 * Turns one text frame back into a packet. A binary chunk or a frame that is
 * not superjson text is dropped with a warning.
 */
class Decoder extends Emitter<DecoderEvents, DecoderEvents> {
  add(chunk: unknown): void {
    if (typeof chunk !== "string") {
      console.warn(`[BridgeParser] Dropped non-text chunk (${typeof chunk})`);
      return;
    }

    let packet: unknown;
    try {
      packet = superjson.parse(chunk);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[BridgeParser] Dropped malformed packet: ${reason}`);
      return;
    }
    this.emit("decoded", packet);
  }

  destroy(): void {
    // Nothing to clean up
  }
}

/**
 * Parser for the host server, readers and injectors.
 */
export const bridgeParser = {
  Encoder,
  Decoder,
};
