import type { Injectable } from "@argwire/types";
import type { InjectionPoint } from "../injection-point";
import type { Signature } from "../signature/signature";

export type ResolvedDependency = {
  parameter: string;
  index: number;
  point: InjectionPoint;
  provider: () => unknown;
};

export type Resolution = {
  signature: Signature;
  dependencies: readonly ResolvedDependency[];
};

/**
 * Memoized resolutions per callable. Entries are installed whole; `clear()`
 * swaps the map and bumps the generation so that a resolution computed before
 * the clear is never installed after it.
 */
export class ResolutionCache {
  private entries = new WeakMap<Injectable, Resolution>();
  private generation = 0;

  get version(): number {
    return this.generation;
  }

  get(target: Injectable): Resolution | undefined {
    return this.entries.get(target);
  }

  install(target: Injectable, resolution: Resolution, version: number): boolean {
    if (version !== this.generation) return false;
    this.entries.set(target, resolution);
    return true;
  }

  clear(): void {
    this.entries = new WeakMap();
    this.generation += 1;
  }
}
