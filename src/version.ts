// Kite version, read from the package metadata.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import fs from 'fs-extra'

const packageJson: unknown = fs.readJsonSync(new URL('../package.json', import.meta.url))

function versionOf(metadata: unknown): string {
  if (typeof metadata === 'object' && metadata !== null && 'version' in metadata
    && typeof metadata.version === 'string') {
    return metadata.version
  }
  return 'unknown'
}

export default versionOf(packageJson)
