import { createRequire } from 'module';

type PackageInfo = { name: string; version: string };

function readPackageInfo(): PackageInfo {
  const fallback: PackageInfo = { name: 'sheets-agent-mcp', version: 'unknown' };
  try {
    const require = createRequire(import.meta.url);
    const pkg: unknown = require('../package.json');
    if (!pkg || typeof pkg !== 'object') return fallback;
    const name = 'name' in pkg && typeof pkg.name === 'string' ? pkg.name.trim() : '';
    const version = 'version' in pkg && typeof pkg.version === 'string' ? pkg.version.trim() : '';
    return {
      name: name || fallback.name,
      version: version || fallback.version,
    };
  } catch {
    // package.json is not shipped next to a bundled build
    return fallback;
  }
}

const info = readPackageInfo();

export const PACKAGE_NAME = info.name;
export const VERSION = info.version;
