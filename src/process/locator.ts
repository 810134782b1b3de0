import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import path from 'node:path';

// ── ToolLocator interface ────────────────────────────────────

export interface ToolLocator {
  /** Absolute path of the executable, or `undefined` when it is not on the search path. */
  resolve(name: string): Promise<string | undefined>;
}

export interface PathToolLocatorOptions {
  path?: string | undefined;
  pathExt?: string | undefined;
  platform?: NodeJS.Platform | undefined;
}

// ── Search-path locator ──────────────────────────────────────

async function isExecutableFile(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const info = await stat(candidate);
    if (!info.isFile()) return false;
    // Windows has no execute bit; PATHEXT decides instead.
    if (platform !== 'win32') {
      await access(candidate, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves names the way a shell would: each `PATH` entry in order, first
 * executable match wins. On Windows every `PATHEXT` extension is tried too.
 */
export function createPathToolLocator(options: PathToolLocatorOptions = {}): ToolLocator {
  const platform = options.platform ?? process.platform;
  const searchPath = options.path ?? process.env['PATH'] ?? '';
  const delimiter = platform === 'win32' ? ';' : ':';

  const dirs = searchPath.split(delimiter).filter((d) => d.length > 0);
  const extensions =
    platform === 'win32'
      ? ['', ...(options.pathExt ?? process.env['PATHEXT'] ?? '.EXE;.CMD;.BAT;.COM').split(';')]
      : [''];

  return {
    async resolve(name: string): Promise<string | undefined> {
      if (name.length === 0) return undefined;

      // A name with a separator is a path, not a search-path lookup.
      if (name.includes('/') || (platform === 'win32' && name.includes('\\'))) {
        return (await isExecutableFile(name, platform)) ? path.resolve(name) : undefined;
      }

      for (const dir of dirs) {
        for (const ext of extensions) {
          const candidate = path.join(dir, name + ext);
          if (await isExecutableFile(candidate, platform)) {
            return candidate;
          }
        }
      }
      return undefined;
    },
  };
}
