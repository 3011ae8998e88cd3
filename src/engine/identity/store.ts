import { resolveTimestamp } from "../../shared/time";
import type {
  FeatureVector,
  Identity,
  IdentitySummary,
} from "../../shared/types/identity";
import { isFeatureVector } from "../../shared/validation/detection";

export type IdentityRegistrationOptions = {
  registeredAt?: number;
  imagePath?: string | null;
};

export type RegisterIdentityResult =
  | { success: true; identity: Identity; replaced: boolean }
  | { success: false; kind: "DuplicateOrInvalid"; message: string };

export type RemoveIdentityResult =
  | { success: true; identity: Identity }
  | { success: false; kind: "NotFound"; message: string };

const freezeIdentity = (identity: Identity): Identity => {
  return Object.freeze({
    ...identity,
    featureVector: Object.freeze([...identity.featureVector]),
  });
};

/**
 * Registered identities in registration order.
 *
 * Every mutation swaps in a new frozen snapshot, so a matcher iterating
 * `snapshot()` never observes a half-applied registration or removal.
 */
export class IdentityStore {
  private entries: readonly Identity[] = Object.freeze([]);

  register(
    name: string,
    featureVector: FeatureVector,
    options: IdentityRegistrationOptions = {},
  ): RegisterIdentityResult {
    const trimmedName = name.trim();
    if (trimmedName.length === 0) {
      return {
        success: false,
        kind: "DuplicateOrInvalid",
        message: "Identity name must not be empty",
      };
    }
    if (!isFeatureVector(featureVector)) {
      return {
        success: false,
        kind: "DuplicateOrInvalid",
        message: "Feature vector must be a non-empty list of finite numbers",
      };
    }

    const existingIndex = this.entries.findIndex(
      (entry) => entry.name === trimmedName,
    );
    // A replaced identity keeps its slot and its first registration time.
    const registeredAt =
      existingIndex >= 0
        ? this.entries[existingIndex].registeredAt
        : resolveTimestamp(options.registeredAt);

    const identity = freezeIdentity({
      name: trimmedName,
      featureVector,
      registeredAt,
      imagePath: options.imagePath ?? null,
    });

    const next = [...this.entries];
    if (existingIndex >= 0) {
      next[existingIndex] = identity;
    } else {
      next.push(identity);
    }
    this.entries = Object.freeze(next);

    return { success: true, identity, replaced: existingIndex >= 0 };
  }

  remove(name: string): RemoveIdentityResult {
    const identity = this.get(name);
    if (!identity) {
      return {
        success: false,
        kind: "NotFound",
        message: `Identity "${name}" is not registered`,
      };
    }
    this.entries = Object.freeze(
      this.entries.filter((entry) => entry.name !== identity.name),
    );
    return { success: true, identity };
  }

  get(name: string): Identity | null {
    const trimmedName = name.trim();
    return this.entries.find((entry) => entry.name === trimmedName) ?? null;
  }

  has(name: string): boolean {
    return this.get(name) !== null;
  }

  list(): IdentitySummary[] {
    return this.entries.map(({ name, registeredAt }) => ({
      name,
      registeredAt,
    }));
  }

  snapshot(): readonly Identity[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
