/**
 * Per-source capabilities the pipeline is parameterized by
 */
import type { PromptTemplate } from '../ai/prompts/types.js';
import type { ActorInput } from '../fetchers/types.js';
import type { RecordMapper } from '../normalizers/types.js';
import type { IngestWindow } from '../services/window.js';
import type { ReferenceKind, SourceType } from '../storage/types.js';

export interface SourceDefinition {
    source: SourceType;
    referenceKind: ReferenceKind;
    actorId: string;
    /** Whole days covered by the ingest window */
    lookbackDays: number;
    /** Result cap passed to the actor run */
    maxItems: number;
    /** Canonical query identifier for a user reference, or null when unusable */
    normalizeReference(raw: string): string | null;
    buildInput(targets: string[], window: IngestWindow): ActorInput;
    mapper: RecordMapper;
    prompt: PromptTemplate;
}
