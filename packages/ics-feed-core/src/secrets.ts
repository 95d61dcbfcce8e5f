import { createHash, timingSafeEqual } from "node:crypto";
import type { Authorization, SecretBinding } from "./types.js";

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * One shared secret per calendar entity. Loaded once, read-only afterwards.
 *
 * Secrets are compared as SHA-256 digests so the comparison always runs over 32 bytes,
 * whatever the length of the supplied value.
 */
export class SecretStore {
  private readonly digests: ReadonlyMap<string, Buffer>;

  constructor(bindings: readonly SecretBinding[]) {
    const digests = new Map<string, Buffer>();
    for (const [index, binding] of bindings.entries()) {
      if (!binding.entityId) {
        throw new Error(`bindings[${index}].entityId is required`);
      }
      if (!binding.secret) {
        throw new Error(`bindings[${index}].secret must not be empty`);
      }
      if (digests.has(binding.entityId)) {
        throw new Error(`Duplicate secret binding for ${binding.entityId}`);
      }
      digests.set(binding.entityId, digest(binding.secret));
    }
    this.digests = digests;
  }

  has(entityId: string): boolean {
    return this.digests.has(entityId);
  }

  entityIds(): string[] {
    return [...this.digests.keys()];
  }

  authorize(entityId: string, supplied: string | undefined): Authorization {
    const expected = this.digests.get(entityId);
    if (!expected || supplied === undefined) {
      return "denied";
    }
    return timingSafeEqual(expected, digest(supplied)) ? "granted" : "denied";
  }
}
