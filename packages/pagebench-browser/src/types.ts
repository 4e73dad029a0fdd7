// ============================================================================
// pagebench browser - WebDriver BiDi Protocol Types
// The subset of https://w3c.github.io/webdriver-bidi/ the remote-session
// runner speaks: session lifecycle and browsing-context navigation.
// ============================================================================

// ---------------------------------------------------------------------------
// Core message types
// ---------------------------------------------------------------------------

/** Command sent from client to browser */
export interface BiDiCommand {
	id: number;
	method: string;
	params: Record<string, unknown>;
}

/** Successful response from browser */
export interface BiDiSuccessResponse {
	type: 'success';
	id: number;
	result: Record<string, unknown>;
}

/** Error response from browser */
export interface BiDiErrorResponse {
	type: 'error';
	id: number;
	error: string;
	message: string;
	stacktrace?: string;
}

// ---------------------------------------------------------------------------
// Session module
// ---------------------------------------------------------------------------

export interface SessionNewResult {
	sessionId: string;
	capabilities: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// browsingContext module
// ---------------------------------------------------------------------------

export type BrowsingContextCreateType = 'tab' | 'window';

export interface BrowsingContextCreateParams {
	type: BrowsingContextCreateType;
	background?: boolean;
}

export interface BrowsingContextCreateResult {
	context: string;
}

export type BrowsingContextReadinessState = 'none' | 'interactive' | 'complete';

export interface BrowsingContextNavigateParams {
	context: string;
	url: string;
	wait?: BrowsingContextReadinessState;
}

export interface BrowsingContextNavigateResult {
	navigation: string | null;
	url: string;
}

export interface BrowsingContextInfo {
	context: string;
	url: string;
	children: BrowsingContextInfo[] | null;
	parent?: string | null;
}

export interface BrowsingContextGetTreeResult {
	contexts: BrowsingContextInfo[];
}

// ---------------------------------------------------------------------------
// BiDi error class
// ---------------------------------------------------------------------------

export class BiDiError extends Error {
	constructor(
		public readonly code: string,
		message: string,
		public readonly stacktrace?: string,
	) {
		super(`[${code}] ${message}`);
		this.name = 'BiDiError';
	}
}
