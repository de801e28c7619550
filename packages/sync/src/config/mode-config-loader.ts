import { readFile } from 'fs/promises';
import * as path from 'path';

/**
 * Resolves configuration files relative to a mode-scoped directory and
 * returns their raw text.
 */
export interface ConfigLoader {
  /** Absolute or cwd-relative path a relative config path resolves to */
  resolvePath(relativePath: string): string;
  readConfig(relativePath: string): Promise<string>;
}

export interface ModeConfigLoaderOptions {
  /** Root config directory (default: `config`) */
  baseDir?: string;
  /** Explicit mode; wins over APP_MODE */
  mode?: string;
  /** Mode used when neither `mode` nor APP_MODE is set */
  defaultMode?: string;
}

/**
 * Reads `<baseDir>/<mode>/<relativePath>`, where the mode comes from the
 * APP_MODE environment variable (e.g. `development`, `staging`, `production`).
 */
export class ModeConfigLoader implements ConfigLoader {
  readonly mode: string;
  private readonly baseDir: string;

  constructor(options: ModeConfigLoaderOptions = {}) {
    this.baseDir = options.baseDir ?? 'config';
    this.mode = options.mode ?? process.env.APP_MODE ?? options.defaultMode ?? 'development';
  }

  resolvePath(relativePath: string): string {
    return path.join(this.baseDir, this.mode, relativePath);
  }

  async readConfig(relativePath: string): Promise<string> {
    return readFile(this.resolvePath(relativePath), 'utf8');
  }
}
