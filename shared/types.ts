export type Role = 'user' | 'agent';

export type ValidationSource = 'judge' | 'fallback';

export interface MessageMetadata {
  turnId: string;
  retries: number;
  lowConfidence: boolean;
  validationSource: ValidationSource;
}

export interface Message {
  readonly role: Role;
  readonly content: string;
  readonly timestamp: string;
  readonly metadata?: Readonly<MessageMetadata>;
}

export type DocumentCollection = 'repairs' | 'blogs';

export interface DocumentSearchHint {
  tool: 'search_documents';
  collection: DocumentCollection;
  query: string;
}

export interface PartsQueryHint {
  tool: 'query_parts';
  partNumber?: string;
  keywords?: string;
  applianceType?: string;
  brand?: string;
}

export type RetrievalHint = DocumentSearchHint | PartsQueryHint;

export interface QueryAnalysis {
  inScope: boolean;
  needsRetrieval: boolean;
  rationale: string;
  retrievalHints: RetrievalHint[];
  /** True when the analyzer failed and the fail-open default was used. */
  fallback: boolean;
}

export type ToolArgument = string | number | boolean;

export interface ToolCall {
  toolName: string;
  arguments: Record<string, ToolArgument>;
}

export type BatchToolCall = ToolCall[];

export type CatalogRecord = Record<string, string | number | null>;

export type ToolPayload =
  | { kind: 'text'; text: string }
  | { kind: 'records'; records: CatalogRecord[] };

export interface FailurePayload {
  kind: 'failure';
  error: string;
  timedOut: boolean;
}

export interface FeedbackPayload {
  kind: 'feedback';
  feedback: string;
}

export interface ExternalToolResult {
  isSynthetic: false;
  sourceTool: string;
  payload: ToolPayload | FailurePayload;
}

export interface SyntheticToolResult {
  isSynthetic: true;
  sourceTool: 'response_validator';
  /** Draft round whose rejection produced this feedback (1-based). */
  round: number;
  payload: FeedbackPayload;
}

export type ToolResult = ExternalToolResult | SyntheticToolResult;

export interface ResponseValidation {
  accepted: boolean;
  inScope: boolean;
  hallucinationDetected: boolean;
  appropriate: boolean;
  feedback?: string;
  source: ValidationSource;
}

export type TurnState = 'analyzing' | 'retrieving' | 'drafting' | 'validating' | 'committing';

export interface RoundRecord {
  round: number;
  candidate: string;
  validation: ResponseValidation;
}

export type TurnEvent =
  | { type: 'status'; stage: TurnState; round?: number }
  | { type: 'analysis'; inScope: boolean; needsRetrieval: boolean; fallback: boolean }
  | { type: 'tool_results'; results: Array<{ sourceTool: string; ok: boolean }> }
  | { type: 'token'; content: string }
  | { type: 'retry'; round: number; feedback: string }
  | { type: 'done'; message: Message; retries: number; lowConfidence: boolean }
  | { type: 'error'; message: string };

export interface ChatRequestPayload {
  query: string;
  sessionId?: string;
}

export interface RegenerateRequestPayload {
  query?: string;
  sessionId?: string;
}

export interface ChatResponse {
  sessionId: string;
  answer: string;
  message: Message;
  retries: number;
  lowConfidence: boolean;
}

export interface ResetResponse {
  message: string;
  introduction: string;
}
