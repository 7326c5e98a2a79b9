import type { CodecConfig } from "../config.js";
import type { TypeRegistry } from "../registry.js";

/**
 * What the encode/decode functions need: where to look tags up and how
 * strict to be.
 */
export interface CodecContext {
  readonly registry: TypeRegistry;
  readonly config: CodecConfig;
}

export function messageOf(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.message;
  }
  try {
    return String(thrown);
  } catch {
    return Object.prototype.toString.call(thrown);
  }
}
