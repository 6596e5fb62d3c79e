import { ConfigurationError } from '@switchboard/core';
import type { Capability, CapabilityName } from './types.js';
import { CAPABILITY_NAMES } from './types.js';

export type CapabilityRegistryInput = Partial<Record<CapabilityName, Capability | null>> & {
  general: Capability;
};

/**
 * Capability handles by name, fixed at startup. A name may map to nothing
 * (capability not deployed); `general` must always be present.
 */
export class CapabilityRegistry {
  private readonly entries: ReadonlyMap<CapabilityName, Capability | null>;

  constructor(input: CapabilityRegistryInput) {
    if (!input.general) {
      throw new ConfigurationError('The general capability must be registered', 'general');
    }

    const entries = new Map<CapabilityName, Capability | null>();
    for (const name of CAPABILITY_NAMES) {
      entries.set(name, input[name] ?? null);
    }
    this.entries = entries;
  }

  get(name: CapabilityName): Capability | null {
    return this.entries.get(name) ?? null;
  }

  general(): Capability {
    const general = this.entries.get('general');
    if (!general) {
      throw new ConfigurationError('The general capability must be registered', 'general');
    }
    return general;
  }

  names(): CapabilityName[] {
    return [...this.entries.keys()];
  }

  /** Names that resolve to a handle. */
  available(): CapabilityName[] {
    return this.names().filter((name) => this.entries.get(name) !== null);
  }
}
