/**
 * Actor service access
 */
import type { Config } from '../config/index.js';
import { ActorRunClient } from './actor.client.js';
import type { ActorRunner } from './types.js';

export function createActorRunner(cfg: Config): ActorRunner {
    return new ActorRunClient({
        token: cfg.apifyToken,
        baseUrl: cfg.apifyBaseUrl,
        waitTimeoutSecs: cfg.actorWaitTimeoutSecs,
    });
}

export { ActorRunClient, type ActorRunClientOptions, type FetchFn } from './actor.client.js';
export * from './queries.js';
export * from './types.js';
