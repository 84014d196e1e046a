import fs from 'fs';
import path from 'path';

export type EtlJob = 'esg_fetch';
export type EtlStatus = 'success' | 'failed' | 'running';

export interface EtlRun {
  id: string;
  job: EtlJob;
  status: EtlStatus;
  started_at: string;
  finished_at: string | null;
  duration_sec: number | null;
  symbol_count: number | null;
  error_message: string | null;
  metadata: Record<string, unknown>;
}

export interface EtlLogStore {
  version: string;
  runs: EtlRun[];
}

export const DEFAULT_LOG_FILE = path.join(process.cwd(), 'data/logs/etl_runs.json');
const MAX_RUNS = 100;

function emptyStore(): EtlLogStore {
  return { version: '1.0.0', runs: [] };
}

function loadStore(logFile: string): EtlLogStore {
  if (!fs.existsSync(logFile)) {
    return emptyStore();
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(logFile, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'runs' in parsed && Array.isArray(parsed.runs)) {
      return parsed as EtlLogStore;
    }
  } catch {
    // Corrupt log is replaced on the next save
  }
  return emptyStore();
}

function saveStore(logFile: string, store: EtlLogStore): void {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  fs.writeFileSync(logFile, JSON.stringify(store, null, 2), 'utf-8');
}

export function startEtlRun(
  job: EtlJob,
  metadata: Record<string, unknown> = {},
  logFile: string = DEFAULT_LOG_FILE
): string {
  const store = loadStore(logFile);
  const id = `${job}_${Date.now()}`;
  const run: EtlRun = {
    id,
    job,
    status: 'running',
    started_at: new Date().toISOString(),
    finished_at: null,
    duration_sec: null,
    symbol_count: null,
    error_message: null,
    metadata,
  };
  store.runs.unshift(run);
  store.runs = store.runs.slice(0, MAX_RUNS);
  saveStore(logFile, store);
  return id;
}

export function finishEtlRun(
  id: string,
  status: 'success' | 'failed',
  symbolCount: number | null = null,
  errorMessage: string | null = null,
  metadata: Record<string, unknown> = {},
  logFile: string = DEFAULT_LOG_FILE
): void {
  const store = loadStore(logFile);
  const run = store.runs.find((r) => r.id === id);
  if (!run) return;

  run.status = status;
  run.finished_at = new Date().toISOString();
  run.duration_sec = Math.round(
    (new Date(run.finished_at).getTime() - new Date(run.started_at).getTime()) / 1000
  );
  run.symbol_count = symbolCount;
  run.error_message = errorMessage;
  run.metadata = { ...run.metadata, ...metadata };
  saveStore(logFile, store);
}

export function getLastSuccessfulRun(
  job: EtlJob,
  logFile: string = DEFAULT_LOG_FILE
): EtlRun | null {
  return loadStore(logFile).runs.find((r) => r.job === job && r.status === 'success') ?? null;
}
