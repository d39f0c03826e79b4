/**
 * Filter Registry
 *
 * One filter per tenant (a chat server, a workspace). Filters are never
 * patched in place: a changed term list builds a fresh filter, which also
 * drops the old verdict cache.
 */

import { SwearFilter } from './filter';
import { getDefaultTables } from './substitutions';
import type { SwearFilterConfig } from './types';

export class FilterRegistry {
  private readonly filters = new Map<string, SwearFilter>();
  private readonly config: Partial<SwearFilterConfig>;

  constructor(config: Partial<SwearFilterConfig> = {}) {
    // Every tenant reads the same tables
    this.config = { ...config, tables: config.tables ?? getDefaultTables() };
  }

  get(tenantId: string): SwearFilter | undefined {
    return this.filters.get(tenantId);
  }

  /** Existing filter, or a new one built from `terms` */
  ensure(tenantId: string, terms: Iterable<string>): SwearFilter {
    return this.filters.get(tenantId) ?? this.update(tenantId, terms);
  }

  update(tenantId: string, terms: Iterable<string>): SwearFilter {
    const filter = new SwearFilter(terms, this.config);
    this.filters.set(tenantId, filter);
    return filter;
  }

  remove(tenantId: string): boolean {
    return this.filters.delete(tenantId);
  }

  get size(): number {
    return this.filters.size;
  }
}
