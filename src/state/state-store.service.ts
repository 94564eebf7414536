import { Injectable, Logger, Inject } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { getErrorMessage } from '../shared/error.utils';
import { STATE_CONFIG } from './state.tokens';
import type { CertificateRequest, StateConfig, StewardState, WorkloadStatus } from './interfaces';

const STATE_FILE = 'state.json';
const WORKLOAD_STATES = ['blocked', 'waiting', 'active'] as const;

export function createInitialState(): StewardState {
  return {
    installed: false,
    registered: false,
    renewRequested: false,
    renewed: false,
    lastRenewedAt: null,
    previousFqdn: null,
    failedFqdn: null,
    openedPorts: [],
    pendingRequests: [],
    status: null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBoolean(value: unknown): boolean {
  return value === true;
}

function readOptionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function readStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function readRequest(value: unknown): CertificateRequest | null {
  if (!isRecord(value) || typeof value.id !== 'string' || typeof value.createdAt !== 'string') {
    return null;
  }

  const fqdns = readStringArray(value.fqdns);
  if (fqdns.length === 0) {
    return null;
  }

  return {
    id: value.id,
    fqdns,
    contactEmail: typeof value.contactEmail === 'string' && value.contactEmail ? value.contactEmail : undefined,
    source: value.source === 'config' ? 'config' : 'api',
    createdAt: value.createdAt,
  };
}

function readStatus(value: unknown): WorkloadStatus | null {
  if (!isRecord(value) || typeof value.message !== 'string' || typeof value.updatedAt !== 'string') {
    return null;
  }

  const state = WORKLOAD_STATES.find((candidate) => candidate === value.state);
  return state ? { state, message: value.message, updatedAt: value.updatedAt } : null;
}

/**
 * Converts a parsed state file into a well-formed state record.
 * Unknown fields are dropped and malformed entries fall back to defaults.
 */
export function normalizeState(raw: unknown): StewardState {
  const state = createInitialState();

  if (!isRecord(raw)) {
    return state;
  }

  const pendingRequests = Array.isArray(raw.pendingRequests) ? raw.pendingRequests : [];

  return {
    installed: readBoolean(raw.installed),
    registered: readBoolean(raw.registered),
    renewRequested: readBoolean(raw.renewRequested),
    renewed: readBoolean(raw.renewed),
    lastRenewedAt: readOptionalString(raw.lastRenewedAt),
    previousFqdn: readOptionalString(raw.previousFqdn),
    failedFqdn: readOptionalString(raw.failedFqdn),
    openedPorts: readStringArray(raw.openedPorts),
    pendingRequests: pendingRequests
      .map((request) => readRequest(request))
      .filter((request): request is CertificateRequest => request !== null),
    status: readStatus(raw.status),
  };
}

/**
 * Holds the single persisted state record.
 *
 * The record is read from `<dataPath>/state.json` once, when the service is
 * constructed, and written back atomically on every update. All mutations go
 * through `update()`.
 */
@Injectable()
export class StateStoreService {
  private readonly logger = new Logger(StateStoreService.name);
  private readonly statePath: string;
  private state: StewardState;

  constructor(@Inject(STATE_CONFIG) private readonly config: StateConfig) {
    this.statePath = path.join(this.config.dataPath, STATE_FILE);
    this.state = this.load();
  }

  /**
   * Returns a copy of the current state record.
   */
  snapshot(): StewardState {
    return structuredClone(this.state);
  }

  /**
   * Applies a mutation to a copy of the record and persists it.
   * The in-memory record only changes once the write succeeded.
   * @returns The updated record.
   */
  update(mutate: (draft: StewardState) => void): StewardState {
    const draft = structuredClone(this.state);
    mutate(draft);
    this.persist(draft);
    this.state = draft;
    return structuredClone(draft);
  }

  private load(): StewardState {
    if (!fs.existsSync(this.statePath)) {
      this.logger.log(`No state file at ${this.statePath}; starting fresh`);
      return createInitialState();
    }

    const content = fs.readFileSync(this.statePath, 'utf-8');
    let raw: unknown;

    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new Error(`State file ${this.statePath} is not valid JSON: ${getErrorMessage(error)}`);
    }

    const state = normalizeState(raw);
    this.logger.log('State loaded', {
      installed: state.installed,
      registered: state.registered,
      pendingRequests: state.pendingRequests.length,
    });
    return state;
  }

  private persist(state: StewardState): void {
    if (!fs.existsSync(this.config.dataPath)) {
      fs.mkdirSync(this.config.dataPath, { recursive: true, mode: 0o700 });
    }

    this.atomicWriteFile(this.statePath, JSON.stringify(state, null, 2), { mode: 0o600 });
  }

  /**
   * Writes data to a temporary file and atomically renames it into place.
   */
  private atomicWriteFile(targetPath: string, data: string, options: fs.WriteFileOptions): void {
    const directory = path.dirname(targetPath);
    const baseName = path.basename(targetPath);
    const tempPath = path.join(
      directory,
      `${baseName}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`,
    );

    try {
      fs.writeFileSync(tempPath, data, options);
      fs.renameSync(tempPath, targetPath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        try {
          fs.unlinkSync(tempPath);
        } catch {
          this.logger.warn('Failed to clean up temporary state file', { tempPath });
        }
      }
      throw error;
    }
  }
}
