/**
 * Service Registry
 *
 * Dependency injection setup for domain services
 * One query cache is shared by every service so invalidations reach all cached reads
 */

import type { Database } from '@eurocoin/database';
import {
  CatalogService,
  DrizzleCatalogRepository,
  DrizzleGroupRepository,
  DrizzleOwnershipRepository,
  GroupService,
  GroupViewService,
  ImportService,
  OwnershipService,
  QueryCache,
  type CatalogRepository,
  type GroupRepository,
  type OwnershipRepository,
} from '@eurocoin/core';

export interface Repositories {
  catalogRepo: CatalogRepository;
  ownershipRepo: OwnershipRepository;
  groupRepo: GroupRepository;
}

export interface Services {
  cache: QueryCache;
  catalog: CatalogService;
  ownership: OwnershipService;
  groups: GroupService;
  groupViews: GroupViewService;
  imports: ImportService;
  /** Uncached round trip to the store, for readiness checks */
  probeStore: () => Promise<void>;
}

export interface ServiceOptions {
  cacheTtlMs?: number;
  now?: () => Date;
}

export function createRepositories(db: Database): Repositories {
  return {
    catalogRepo: new DrizzleCatalogRepository(db),
    ownershipRepo: new DrizzleOwnershipRepository(db),
    groupRepo: new DrizzleGroupRepository(db),
  };
}

export function createServices(repos: Repositories, options: ServiceOptions = {}): Services {
  const { catalogRepo, ownershipRepo, groupRepo } = repos;
  const cache = new QueryCache({ ttlMs: options.cacheTtlMs });

  const ownership = new OwnershipService(ownershipRepo, catalogRepo, groupRepo, cache, {
    now: options.now,
  });

  return {
    cache,
    catalog: new CatalogService(catalogRepo, cache),
    ownership,
    groups: new GroupService(groupRepo, cache),
    groupViews: new GroupViewService(groupRepo, catalogRepo, ownershipRepo, cache),
    imports: new ImportService(catalogRepo, ownershipRepo, ownership, cache),
    probeStore: async () => {
      await catalogRepo.count({});
    },
  };
}
