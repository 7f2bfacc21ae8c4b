import type { PrincipalId } from '@sealdrop/kernel';

/**
 * Per-handle decrypt allow-list.
 *
 * Entries are only ever added: a principal once allowed on a handle stays
 * allowed. Order of insertion is preserved for listing.
 */
export class HandleAcl {
  private readonly entries = new Map<string, Set<PrincipalId>>();

  allow(handle: string, principal: PrincipalId): void {
    let principals = this.entries.get(handle);
    if (!principals) {
      principals = new Set();
      this.entries.set(handle, principals);
    }
    principals.add(principal);
  }

  isAllowed(handle: string, principal: PrincipalId): boolean {
    return this.entries.get(handle)?.has(principal) ?? false;
  }

  list(handle: string): PrincipalId[] {
    return Array.from(this.entries.get(handle) ?? []);
  }
}
