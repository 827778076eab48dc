import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import ini from 'ini';

type IniSection = Record<string, string | boolean | number>;
type IniConfig = Record<string, IniSection>;

/** Maps NODE_ENV onto the suffix of the override file (`config.<env>.props`). */
export function configEnvFor(nodeEnv: string | undefined): string | undefined {
  if (nodeEnv === 'production') return 'prod';
  if (nodeEnv === 'development') return 'dev';
  return undefined;
}

export class ConfigLoader {
  private config: IniConfig;

  constructor(env?: string, configDir?: string) {
    const dir = configDir ?? process.env['RELAY_CONFIG_DIR'] ?? this.resolveConfigDir();

    const base = this.readFile(path.join(dir, 'config.props'));
    const override = env ? this.readFile(path.join(dir, `config.${env}.props`)) : {};

    this.config = this.deepMerge(base, override);
  }

  /**
   * Raw string value for a key, with `${ENV_VAR}` placeholders resolved.
   * Undefined when the key is absent, empty, or points at an unset variable.
   */
  lookup(section: string, key: string): string | undefined {
    const raw = this.config[section]?.[key];
    if (raw === undefined || raw === '') return undefined;

    // ini may parse `true`/`false` as actual booleans — normalise to string first
    const rawStr = String(raw);

    if (rawStr.startsWith('${') && rawStr.endsWith('}')) {
      const resolved = process.env[rawStr.slice(2, -1)];
      return resolved === '' ? undefined : resolved;
    }
    return rawStr;
  }

  get<T extends string | number | boolean = string>(section: string, key: string, fallback: T): T {
    const value = this.lookup(section, key);
    if (value === undefined) return fallback;
    return this.coerce(value, fallback);
  }

  private coerce<T extends string | number | boolean>(value: string, fallback: T): T {
    if (typeof fallback === 'number') return Number(value) as T;
    if (typeof fallback === 'boolean') return (value === 'true') as T;
    return value as T;
  }

  private resolveConfigDir(): string {
    // Works in both tsx (src/) and compiled (dist/) contexts:
    //   src/config/ → src/ → relay-server/ → packages/ → repo root
    const here = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(here, '..', '..', '..', '..', 'config');
  }

  private readFile(filePath: string): IniConfig {
    if (!fs.existsSync(filePath)) return {};
    return ini.parse(fs.readFileSync(filePath, 'utf-8')) as IniConfig;
  }

  private deepMerge(base: IniConfig, override: IniConfig): IniConfig {
    const result: IniConfig = { ...base };
    for (const section of Object.keys(override)) {
      result[section] = { ...(base[section] ?? {}), ...override[section] };
    }
    return result;
  }
}
