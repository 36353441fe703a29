/**
 * Bundled catalog of common platform types.
 *
 * @packageDocumentation
 */

import { fileURLToPath } from 'node:url';
import { CatalogTypeSource, loadTypeCatalog } from './catalog.js';
import type { TypeCatalog } from './catalog.js';

/** Location of the bundled platform catalog. */
export const PLATFORM_CATALOG_PATH = fileURLToPath(
  new URL('../../resources/platform-types.toml', import.meta.url)
);

let platformCatalog: Promise<TypeCatalog> | undefined;

/**
 * Loads the bundled platform catalog once per process.
 */
export function loadPlatformCatalog(): Promise<TypeCatalog> {
  platformCatalog ??= loadTypeCatalog(PLATFORM_CATALOG_PATH);
  return platformCatalog;
}

/**
 * Creates a type source over the bundled platform catalog.
 */
export async function createPlatformTypeSource(): Promise<CatalogTypeSource> {
  return new CatalogTypeSource(await loadPlatformCatalog(), 'platform types');
}
