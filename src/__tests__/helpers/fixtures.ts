import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ProviderConfig } from '../../config/providers';
import { createSnapshot } from '../../services/entityMerger';
import type { Character, Snapshot } from '../../types/analysis';

export const localConfig: ProviderConfig = {
  kind: 'local',
  model: 'test-model',
  endpoint: 'http://localhost:8080/v1',
  timeoutMs: 1000,
};

export function makeCharacter(name: string, overrides: Partial<Character> = {}): Character {
  return {
    id: `char_${name.toLowerCase()}`,
    name,
    role: 'Not specified',
    description: `${name} appears.`,
    occupation: [],
    ...overrides,
  };
}

export function makeSnapshot(analysisProgress: number, overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    ...createSnapshot('Test Book', 'Test Author'),
    characters: [makeCharacter('Ann')],
    analysisProgress,
    ...overrides,
  };
}

/** Snapshot shaped like the result of a safety-blocked run */
export function makeEmptySnapshot(analysisProgress: number): Snapshot {
  return { ...createSnapshot('Test Book', 'Test Author'), analysisProgress };
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'analysis-cache-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function httpError(status: number, message = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { status });
}
