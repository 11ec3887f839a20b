/**
 * Currency Registry
 *
 * Resolves currency identifiers to the handles that move and observe them.
 *
 * Design rules:
 * - Handles are registered, not auto-discovered
 * - Each currency has at most one handle
 * - Lookups of an unregistered currency throw
 */

import type { Currency } from "@flashvault/types";
import type { CurrencyHandle } from "./types.js";
import { VaultError } from "./types.js";

export class CurrencyRegistry {
  private readonly handles: Map<Currency, CurrencyHandle> = new Map();

  constructor(handles: readonly CurrencyHandle[] = []) {
    for (const handle of handles) {
      this.register(handle);
    }
  }

  /**
   * Register a handle. Throws if the currency already has one.
   */
  register(handle: CurrencyHandle): void {
    if (this.handles.has(handle.id)) {
      throw new VaultError(
        "CURRENCY_EXISTS",
        `Currency '${handle.id}' is already registered`,
      );
    }
    this.handles.set(handle.id, handle);
  }

  get(currency: Currency): CurrencyHandle {
    const handle = this.handles.get(currency);
    if (!handle) {
      throw new VaultError(
        "UNKNOWN_CURRENCY",
        `No handle registered for currency '${currency}'`,
      );
    }
    return handle;
  }

  has(currency: Currency): boolean {
    return this.handles.has(currency);
  }

  list(): readonly Currency[] {
    return [...this.handles.keys()];
  }
}
