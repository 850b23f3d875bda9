/**
 * Source registry, in ingestion order
 */
import type { Config } from '../config/index.js';
import { createFacebookSource } from './facebook.source.js';
import { createTwitterSource } from './twitter.source.js';
import type { SourceDefinition } from './types.js';

export function createSources(cfg: Config): SourceDefinition[] {
    return [createTwitterSource(cfg), createFacebookSource(cfg)];
}

export type { SourceDefinition } from './types.js';
