// src/sources/index.ts

import type { AdapterDeps, SourceAdapter } from './types';
import { loadBundledProfiles, type SourceProfile } from './profiles';
import { LinkDiscoveryAdapter } from './LinkDiscoveryAdapter';
import { MoodleCatalogAdapter } from './MoodleCatalogAdapter';
import { RenderedCatalogAdapter } from './RenderedCatalogAdapter';
import { StubAdapter } from './StubAdapter';

export function createAdapter(profile: SourceProfile, deps: AdapterDeps): SourceAdapter {
  switch (profile.kind) {
    case 'link-discovery':
      return new LinkDiscoveryAdapter(profile, deps);
    case 'moodle':
      return new MoodleCatalogAdapter(profile, deps);
    case 'rendered':
      return new RenderedCatalogAdapter(profile, deps);
    case 'stub':
      return new StubAdapter(profile);
  }
}

/**
 * Adapters for the bundled profiles, in listing order.
 */
export function defaultSources(deps: AdapterDeps, profiles: SourceProfile[] = loadBundledProfiles()): SourceAdapter[] {
  return profiles.map((profile) => createAdapter(profile, deps));
}

export * from './types';
export * from './profiles';
export { LinkDiscoveryAdapter, MoodleCatalogAdapter, RenderedCatalogAdapter, StubAdapter };
