/**
 * Domain models: value objects the pipeline passes between stages.
 * Decoupled from both API payload shapes and provider wire formats.
 */

// ── Detection ──

export type DomainFilter = 'general' | 'healthcare';

export type PolicyMode = 'redact' | 'reject';

/**
 * Category name as the detector reports it. The set is open-ended; the
 * listed names are the ones the pipeline is commonly exercised with.
 */
export type EntityCategory =
  | 'Person'
  | 'PersonType'
  | 'Email'
  | 'PhoneNumber'
  | 'Address'
  | 'Age'
  | 'DateTime'
  | 'MedicalRecordNumber'
  | 'USSocialSecurityNumber'
  | 'Organization'
  | (string & {});

/** Candidate span as returned by the detection provider. */
export interface RawEntity {
  readonly category: EntityCategory;
  readonly subcategory?: string;
  readonly text: string;
  /** UTF-16 code unit offset into the analysed text. */
  readonly offset: number;
  readonly length: number;
  readonly confidenceScore: number;
}

export interface Entity {
  readonly category: EntityCategory;
  readonly subcategory?: string;
  readonly text: string;
  readonly startOffset: number;
  readonly length: number;
  readonly confidenceScore: number;
}

/** Sorted by startOffset ascending, pairwise disjoint. */
export type ResolvedEntitySet = readonly Entity[];

export interface DetectionResult {
  readonly originalText: string;
  readonly redactedText: string;
  readonly entities: ResolvedEntitySet;
  readonly hasPii: boolean;
  readonly shouldReject: boolean;
}

/** Category → number of surviving entities. */
export type EntitySummary = Readonly<Record<string, number>>;

// ── Grounding ──

export interface Conversation {
  readonly agentId: string;
  readonly threadId: string;
  readonly createdAt: Date;
}

export interface Citation {
  readonly url: string;
  readonly title: string;
  /** Index of first appearance in the answer text. */
  readonly position: number;
}

export interface GroundedResponse {
  readonly answerText: string;
  readonly citations: readonly Citation[];
  readonly threadId: string;
  readonly runId: string;
  readonly groundingUsed: boolean;
}

export type GroundingState =
  | 'Idle'
  | 'AgentReady'
  | 'ThreadOpen'
  | 'MessageSubmitted'
  | 'Running'
  | 'Completed'
  | 'Failed';
