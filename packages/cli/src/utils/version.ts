import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

/**
 * Package version loader. Sources live at src/utils/, builds at
 * dist/utils/; both sit two levels below package.json.
 */

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const require = createRequire(import.meta.url);

interface PackageInfo {
  name?: string;
  version: string;
}

function isPackageInfo(value: unknown): value is PackageInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

function loadPackageInfo(): PackageInfo {
  const loaded: unknown = require(join(__dirname, '../../package.json'));
  return isPackageInfo(loaded) ? loaded : { version: '0.0.0-unknown' };
}

const packageInfo = loadPackageInfo();

/**
 * Get the current package version
 */
export function getPackageVersion(): string {
  return packageInfo.version;
}
