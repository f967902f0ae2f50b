import type { FileKind, IdentityFields } from './records/types.js';
import { readJson } from './store/persistence.js';

export interface AuditConfig {
  identityFields: IdentityFields;
  /** Fields whose values legitimately differ between reference and translation. */
  ignoredFields: string[];
  /** Fields that mark text still waiting for translation. */
  untranslatedFields: string[];
  encoding: BufferEncoding;
  /** Case-insensitive path fragment that selects single-key mode under --unicode auto. */
  singleKeyPathMarker: string;
}

export type UnicodeOption = 'true' | 'false' | 'auto';

export const DEFAULT_CONFIG: AuditConfig = {
  identityFields: { primary: 'name', secondary: 'tag' },
  ignoredFields: ['t', 'T', 'oc', 'OC', 'CT', 'ct'],
  untranslatedFields: ['t', 'ot', 'oc'],
  encoding: 'utf-8',
  singleKeyPathMarker: 'unicode',
};

export function resolveFileKind(
  option: UnicodeOption,
  derivedPath: string,
  config: AuditConfig,
): FileKind {
  if (option === 'true') return 'single-key';
  if (option === 'false') return 'composite';
  const marker = config.singleKeyPathMarker.toLowerCase();
  return derivedPath.toLowerCase().includes(marker) ? 'single-key' : 'composite';
}

/**
 * Load a JSON config file and merge it over the defaults.
 * Unknown keys or values of the wrong type are rejected.
 */
export async function loadConfig(configPath: string | undefined): Promise<AuditConfig> {
  if (!configPath) return DEFAULT_CONFIG;

  const raw = await readJson<unknown>(configPath);
  if (raw === null) {
    throw new Error(`Cannot read config file ${configPath}`);
  }
  return mergeConfig(raw, configPath);
}

export function mergeConfig(raw: unknown, source: string): AuditConfig {
  if (!isRecord(raw)) {
    throw new Error(`${source}: config must be a JSON object`);
  }

  const config: AuditConfig = {
    ...DEFAULT_CONFIG,
    identityFields: { ...DEFAULT_CONFIG.identityFields },
  };

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'identityFields': {
        if (!isRecord(value)) throw invalid(source, key, 'an object');
        const { primary, secondary } = value;
        if (primary !== undefined) {
          if (typeof primary !== 'string' || !primary) throw invalid(source, 'identityFields.primary', 'a non-empty string');
          config.identityFields.primary = primary;
        }
        if (secondary !== undefined) {
          if (typeof secondary !== 'string' || !secondary) throw invalid(source, 'identityFields.secondary', 'a non-empty string');
          config.identityFields.secondary = secondary;
        }
        break;
      }
      case 'ignoredFields':
      case 'untranslatedFields': {
        if (!isStringArray(value)) throw invalid(source, key, 'an array of strings');
        config[key] = value;
        break;
      }
      case 'encoding': {
        if (typeof value !== 'string' || !Buffer.isEncoding(value)) {
          throw invalid(source, key, 'a Node.js buffer encoding');
        }
        config.encoding = value;
        break;
      }
      case 'singleKeyPathMarker': {
        if (typeof value !== 'string' || !value) throw invalid(source, key, 'a non-empty string');
        config.singleKeyPathMarker = value;
        break;
      }
      default:
        throw new Error(`${source}: unknown config key "${key}"`);
    }
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function invalid(source: string, key: string, expected: string): Error {
  return new Error(`${source}: "${key}" must be ${expected}`);
}
