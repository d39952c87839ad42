import { promises as fs } from 'fs';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/lib/util';
import { PersistedProxyState } from '../interfaces/proxy.interface';
import { PROXY_STATE_VERSION } from '../proxy.constants';

/**
 * Durable home of the pool's rotation counters and per-endpoint health.
 */
export interface ProxyStateStore {
  /** Resolves null when nothing usable was stored. */
  load(): Promise<PersistedProxyState | null>;
  save(state: PersistedProxyState): Promise<void>;
}

function isRotation(value: unknown): value is Record<string, number> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return Object.values(value).every(
    (index) => typeof index === 'number' && Number.isInteger(index) && index >= 0,
  );
}

function isPersistedState(value: unknown): value is PersistedProxyState {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    record.version === PROXY_STATE_VERSION &&
    isRotation(record.rotation) &&
    typeof record.endpoints === 'object' &&
    record.endpoints !== null
  );
}

/**
 * JSON file store. Writes go to a temporary sibling first and are renamed
 * into place.
 */
export class FileProxyStateStore implements ProxyStateStore {
  private readonly logger = new Logger(FileProxyStateStore.name);
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  async load(): Promise<PersistedProxyState | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.log(`No proxy state at ${this.filePath}, starting fresh`);
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn(
        `Ignoring unreadable proxy state ${this.filePath}: ${errorMessage(error)}`,
      );
      return null;
    }

    if (!isPersistedState(parsed)) {
      this.logger.warn(
        `Ignoring proxy state ${this.filePath}: unsupported format`,
      );
      return null;
    }
    return parsed;
  }

  async save(state: PersistedProxyState): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }
}

export class InMemoryProxyStateStore implements ProxyStateStore {
  private stored: string | null = null;
  saves = 0;

  constructor(initial?: PersistedProxyState) {
    if (initial) {
      this.stored = JSON.stringify(initial);
    }
  }

  async load(): Promise<PersistedProxyState | null> {
    if (this.stored === null) {
      return null;
    }
    const parsed: unknown = JSON.parse(this.stored);
    return isPersistedState(parsed) ? parsed : null;
  }

  async save(state: PersistedProxyState): Promise<void> {
    this.stored = JSON.stringify(state);
    this.saves++;
  }
}
