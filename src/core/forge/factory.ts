import type { Config } from '@/types'
import type { ForgeProvider } from '@/core/forge/base'
import { GitHubForgeProvider } from '@/core/forge/github'

/**
 * Instantiates the forge provider for the loaded configuration.
 *
 * @param config - Loaded prdash configuration; `ghBinary` is read here.
 * @category Forge
 */
export function createForgeProvider(config: Config): ForgeProvider {
  return new GitHubForgeProvider(config.ghBinary)
}
