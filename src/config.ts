import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Same depth from src/ and dist/, so the project root is always one level up
const PROJECT_ROOT = path.resolve(__dirname, '..');

export interface Config {
  // Congress.gov
  congressApiKey: string;
  congressApiRoot: string;

  // Illinois General Assembly FTP mirror
  ilFtpRoot: string;

  // Paths
  dataDir: string;
  dbPath: string;
  bulkBillStatusDir: string;

  // Fetch fan-out
  detailWorkers: number;
  ilMaxWorkers: number;
  requestDelayMs: number;

  // Logging
  logLevel: string;
}

type RcFile = Partial<Record<string, string | number>>;

function loadEnvFile(): void {
  const envPath = path.resolve(PROJECT_ROOT, '.env');
  let envText: string;
  try {
    envText = fs.readFileSync(envPath, 'utf-8');
  } catch {
    return; // .env is optional
  }

  for (const line of envText.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq > 0) {
      const key = trimmed.slice(0, eq).trim();
      const val = trimmed.slice(eq + 1).trim();
      if (!process.env[key]) process.env[key] = val;
    }
  }
}

function loadRcFile(): RcFile {
  const rcPath = path.resolve(PROJECT_ROOT, '.sponsorstatsrc.json');
  let raw: string;
  try {
    raw = fs.readFileSync(rcPath, 'utf-8');
  } catch {
    return {};
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};

  const rc: RcFile = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number') rc[key] = value;
  }
  return rc;
}

export function loadConfig(overrides: Partial<Config> = {}): Config {
  loadEnvFile();
  const rc = loadRcFile();

  const str = (envKey: string, fallback = ''): string => {
    const fromEnv = process.env[envKey];
    if (fromEnv) return fromEnv;
    const fromRc = rc[envKey];
    return fromRc !== undefined ? String(fromRc) : fallback;
  };

  const num = (envKey: string, fallback: number): number => {
    const parsed = Number(str(envKey));
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
  };

  const dataDir = overrides.dataDir ?? path.resolve(PROJECT_ROOT, 'data');

  return {
    congressApiKey: overrides.congressApiKey ?? str('CONGRESS_API_KEY'),
    congressApiRoot: overrides.congressApiRoot ?? str('CONGRESS_API_ROOT', 'https://api.congress.gov/v3'),
    ilFtpRoot: overrides.ilFtpRoot ?? str('IL_FTP_ROOT', 'https://ilga.gov/ftp'),

    dataDir,
    dbPath: overrides.dbPath ?? str('DB_PATH', path.resolve(dataDir, 'sponsor-stats.db')),
    bulkBillStatusDir: overrides.bulkBillStatusDir ?? str('BULK_BILL_STATUS_DIR', path.resolve(dataDir, 'billstatus')),

    detailWorkers: overrides.detailWorkers ?? num('DETAIL_WORKERS', 8),
    ilMaxWorkers: overrides.ilMaxWorkers ?? num('IL_MAX_WORKERS', 4),
    requestDelayMs: overrides.requestDelayMs ?? num('REQUEST_DELAY_MS', 100),

    logLevel: overrides.logLevel ?? str('LOG_LEVEL', 'info'),
  };
}
