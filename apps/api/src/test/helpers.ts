/**
 * HTTP test helpers
 * Builds the Hono app over in-memory repositories and makes requests against it
 */

import type { Env, Hono } from 'hono';
import {
  InMemoryCatalogRepository,
  InMemoryGroupRepository,
  InMemoryOwnershipRepository,
} from '@eurocoin/core/testing';
import type { Coin, Group, GroupMember, OwnershipEvent } from '@eurocoin/core';
import { createApp } from '../app.js';
import type { ApiConfig } from '../config.js';
import { createServices, type Services } from '../services/index.js';

export const TEST_ADMIN_KEY = 'test-secret';

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  /** Objects are sent as JSON; strings are sent as they are */
  body?: unknown;
  headers?: Record<string, string>;
}

export function createTestConfig(overrides: Partial<ApiConfig> = {}): ApiConfig {
  return {
    env: 'test',
    port: 3000,
    databaseUrl: 'postgresql://localhost:5432/eurocoin_test',
    databasePoolMax: 1,
    cacheTtlMs: 60_000,
    logLevel: 'silent',
    adminApiKey: TEST_ADMIN_KEY,
    adminAllowedIps: ['0.0.0.0'],
    webAppUrl: 'http://localhost:5173',
    ...overrides,
  };
}

export interface TestSeed {
  coins?: Coin[];
  events?: OwnershipEvent[];
  groups?: Group[];
  members?: GroupMember[];
}

export interface TestContext {
  app: ReturnType<typeof createApp>;
  services: Services;
  catalogRepo: InMemoryCatalogRepository;
  ownershipRepo: InMemoryOwnershipRepository;
  groupRepo: InMemoryGroupRepository;
}

/**
 * Fresh app and services over seeded in-memory repositories
 */
export function createTestContext(
  seed: TestSeed = {},
  configOverrides: Partial<ApiConfig> = {}
): TestContext {
  const catalogRepo = new InMemoryCatalogRepository(seed.coins);
  const ownershipRepo = new InMemoryOwnershipRepository(seed.events);
  const groupRepo = new InMemoryGroupRepository({ groups: seed.groups, members: seed.members });

  const services = createServices({ catalogRepo, ownershipRepo, groupRepo });
  const app = createApp(services, createTestConfig(configOverrides));

  return { app, services, catalogRepo, ownershipRepo, groupRepo };
}

/**
 * Make an HTTP request to the Hono app
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': typeof body === 'string' ? 'text/csv' : 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  return app.request(path, init);
}

/**
 * Make a request carrying the admin bearer key
 */
export async function makeAdminRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  return makeRequest(app, method, path, {
    ...options,
    headers: { ...(options.headers ?? {}), Authorization: `Bearer ${TEST_ADMIN_KEY}` },
  });
}
