/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { makeDocument, openIndexStore } from "@topicsearch/sdk";
import type { CommitResult, IndexStore, OpenStoreOptions } from "@topicsearch/sdk";

export interface SeedDocument {
  url: string;
  topics: string[];
  title?: string;
}

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "topicsearch-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "topicsearch-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a writer on a fresh index, closing and removing it after
 * @param fn - Function to execute with the store and its directory
 * @param options - Optional open options (mode defaults to flush)
 * @returns Result of fn
 */
export async function withTempIndex<T>(
  fn: (store: IndexStore, dir: string) => Promise<T>,
  options: OpenStoreOptions = {}
): Promise<T> {
  return withTempDir(async (dir) => {
    const store = await openIndexStore(dir, { mode: "flush", ...options });
    try {
      return await fn(store, dir);
    } finally {
      await store.close();
    }
  });
}

/**
 * Write and commit documents into the index at a path, replacing its content
 */
export async function seedIndex(dir: string, docs: readonly SeedDocument[]): Promise<CommitResult> {
  const store = await openIndexStore(dir, { mode: "flush" });
  try {
    for (const doc of docs) {
      store.upsert(makeDocument(doc.url, doc.topics, { title: doc.title }));
    }
    return await store.commit();
  } finally {
    await store.close();
  }
}
