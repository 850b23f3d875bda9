/**
 * Actor Run Client
 * Starts an actor run over the actor service REST API, waits for it to
 * finish, and pages through the run's default dataset.
 */
import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { ActorInvocationError, EmptyDatasetError, errorMessage } from '../utils/errors.js';
import {
    TERMINAL_RUN_STATUSES,
    type ActorCallOptions,
    type ActorInput,
    type ActorRun,
    type ActorRunner,
    type RawItem,
} from './types.js';

// Longest server-side wait the API honours per request
const MAX_WAIT_SECS = 60;
const DEFAULT_PAGE_SIZE = 1000;

const runEnvelopeSchema = z.object({
    data: z.object({
        id: z.string(),
        status: z.string(),
        defaultDatasetId: z.string().nullish(),
        statusMessage: z.string().nullish(),
    }),
});

const datasetPageSchema = z.array(z.record(z.unknown()));

type RunInfo = z.infer<typeof runEnvelopeSchema>['data'];

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ActorRunClientOptions {
    token: string;
    baseUrl: string;
    /** Upper bound on the wait for a run; null waits as long as the actor runs. */
    waitTimeoutSecs: number | null;
    pageSize?: number;
    fetch?: FetchFn;
    now?: () => number;
}

export class ActorRunClient implements ActorRunner {
    private readonly baseUrl: string;
    private readonly pageSize: number;
    private readonly fetchFn: FetchFn;
    private readonly now: () => number;

    constructor(private readonly options: ActorRunClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
        this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
        this.now = options.now ?? Date.now;
    }

    /**
     * Start a run and block until it reaches a terminal state.
     * @throws ActorInvocationError when the run cannot be started or does not succeed
     * @throws EmptyDatasetError when the finished run has no dataset
     */
    async call(actorId: string, input: ActorInput, options: ActorCallOptions = {}): Promise<ActorRun> {
        const deadline = this.options.waitTimeoutSecs === null
            ? null
            : this.now() + this.options.waitTimeoutSecs * 1000;

        const params = new URLSearchParams({ waitForFinish: String(this.waitSecs(deadline)) });
        if (options.maxItems !== undefined) params.set('maxItems', String(options.maxItems));
        if (this.options.waitTimeoutSecs !== null) params.set('timeout', String(this.options.waitTimeoutSecs));

        const actorPath = encodeURIComponent(actorId.replace('/', '~'));
        let run = await this.requestRun(`/v2/acts/${actorPath}/runs?${params}`, {
            method: 'POST',
            body: JSON.stringify(input),
        });

        logger.info('Actor run started', { actorId, runId: run.id, status: run.status });

        while (!TERMINAL_RUN_STATUSES.has(run.status)) {
            if (deadline !== null && this.now() >= deadline) {
                throw new ActorInvocationError(`Actor run ${run.id} did not finish before the deadline`, {
                    actorId,
                    runId: run.id,
                    status: run.status,
                    waitTimeoutSecs: this.options.waitTimeoutSecs,
                });
            }
            run = await this.requestRun(
                `/v2/actor-runs/${encodeURIComponent(run.id)}?waitForFinish=${this.waitSecs(deadline)}`,
                { method: 'GET' }
            );
        }

        if (run.status !== 'SUCCEEDED') {
            throw new ActorInvocationError(`Actor run ${run.id} finished with status ${run.status}`, {
                actorId,
                runId: run.id,
                status: run.status,
                statusMessage: run.statusMessage ?? null,
            });
        }

        if (!run.defaultDatasetId) {
            throw new EmptyDatasetError(run.id);
        }

        logger.info('Actor run finished', { actorId, runId: run.id, datasetId: run.defaultDatasetId });

        return { runId: run.id, datasetId: run.defaultDatasetId, status: run.status };
    }

    /**
     * Dataset rows in the order the actor produced them
     */
    async *iterateItems(datasetId: string): AsyncGenerator<RawItem> {
        let offset = 0;

        while (true) {
            const params = new URLSearchParams({
                format: 'json',
                clean: '1',
                offset: String(offset),
                limit: String(this.pageSize),
            });
            const body = await this.request(`/v2/datasets/${encodeURIComponent(datasetId)}/items?${params}`, {
                method: 'GET',
            });

            const page = datasetPageSchema.safeParse(body);
            if (!page.success) {
                throw new ActorInvocationError(`Dataset ${datasetId} returned an unexpected payload`, {
                    datasetId,
                    offset,
                });
            }

            yield* page.data;

            if (page.data.length < this.pageSize) return;
            offset += page.data.length;
        }
    }

    private waitSecs(deadline: number | null): number {
        if (deadline === null) return MAX_WAIT_SECS;
        const remaining = Math.ceil((deadline - this.now()) / 1000);
        return Math.max(0, Math.min(MAX_WAIT_SECS, remaining));
    }

    private async requestRun(path: string, init: RequestInit): Promise<RunInfo> {
        const body = await this.request(path, init);
        const parsed = runEnvelopeSchema.safeParse(body);
        if (!parsed.success) {
            throw new ActorInvocationError('Actor service returned an unexpected run payload', { path });
        }
        return parsed.data.data;
    }

    private async request(path: string, init: RequestInit): Promise<unknown> {
        let response: Response;
        try {
            response = await this.fetchFn(`${this.baseUrl}${path}`, {
                ...init,
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.options.token}`,
                },
            });
        } catch (error) {
            throw new ActorInvocationError(`Actor service request failed: ${errorMessage(error)}`, {
                path: redactPath(path),
            });
        }

        if (!response.ok) {
            const text = await response.text();
            throw new ActorInvocationError(`Actor service error: ${response.status}`, {
                path: redactPath(path),
                status: response.status,
                body: text.slice(0, 500),
            });
        }

        return response.json();
    }
}

function redactPath(path: string): string {
    return path.split('?')[0] ?? path;
}
