/**
 * Actor service types
 */

/**
 * One dataset row as the actor returned it. Schema is actor-specific.
 */
export type RawItem = Record<string, unknown>;

/**
 * Opaque run input handed to the actor as its JSON body
 */
export type ActorInput = Record<string, unknown>;

export type ActorRunStatus =
    | 'READY'
    | 'RUNNING'
    | 'SUCCEEDED'
    | 'FAILED'
    | 'TIMING-OUT'
    | 'TIMED-OUT'
    | 'ABORTING'
    | 'ABORTED';

export const TERMINAL_RUN_STATUSES: ReadonlySet<string> = new Set([
    'SUCCEEDED',
    'FAILED',
    'TIMED-OUT',
    'ABORTED',
]);

export interface ActorRun {
    runId: string;
    datasetId: string;
    status: string;
}

export interface ActorCallOptions {
    maxItems?: number;
}

/**
 * Runs an actor to completion and reads its dataset
 */
export interface ActorRunner {
    call(actorId: string, input: ActorInput, options?: ActorCallOptions): Promise<ActorRun>;
    iterateItems(datasetId: string): AsyncIterable<RawItem>;
}
