// ============================================================================
// pagebench runner - Types
// ============================================================================

import type { BrowserName } from 'pagebench-browser';

/** One entry of benchmarks.json */
export interface BenchmarkSpec {
	/** Suite name results are grouped under */
	suite: string;
	/** Page path, relative to the result server root */
	url: string;
	/** Trials per browser target */
	number_of_runs: number;
	/** Seconds to wait for a postback before giving up on a trial */
	timeout: number;
	/** Record field holding the grouping key (e.g. the page name) */
	name: string;
	/** Record field holding the numeric measurement */
	value: string;
	/** Disabled benchmarks are skipped without running a trial */
	enabled: boolean;
}

/** One measurement reported by a benchmark page */
export type RawResultRecord = Record<string, unknown>;

/** Everything one postback reported, in page order */
export type RawResultSet = RawResultRecord[];

/** Request headers of the postback */
export type ClientMetadata = Record<string, string | string[] | undefined>;

/** What the result channel holds between a postback and the next reset */
export interface Postback {
	metadata: ClientMetadata;
	results: RawResultSet;
}

/**
 * Result of one trial. Only `ok` carries results; `version` is only ever
 * present alongside them.
 */
export type TrialOutcome =
	| { status: 'ok'; version: string | undefined; results: RawResultSet }
	| { status: 'timeout'; waited: number }
	| { status: 'malformed'; reason: string };

/** Grouping key -> measurements in trial order */
export type AggregateResult = Map<string, number[]>;

// ---------------------------------------------------------------------------
// Browser targets
// ---------------------------------------------------------------------------

/**
 * How a parsed browser version is turned into the label a results service
 * files it under.
 */
export type VersionLabelPolicy = { mode: 'full' } | { mode: 'truncate'; length: number };

interface TargetBase {
	/** Browser label used in reports and publications (e.g. 'firefox') */
	label: string;
	/** Release channel label (e.g. 'nightly', 'canary') */
	branch: string;
	versionLabel: VersionLabelPolicy;
}

/** A browser binary started on this machine, one process per trial */
export interface LocalBrowserTarget extends TargetBase {
	kind: 'local';
	browser: BrowserName;
	binary: string;
	args?: string[];
}

/** A browser on a device, driven through a BiDi session */
export interface RemoteBrowserTarget extends TargetBase {
	kind: 'remote';
	/** BiDi WebSocket endpoint, e.g. ws://127.0.0.1:9222/session */
	endpoint: string;
	/** When set, `adb forward tcp:<port> tcp:<port>` runs before connecting */
	forwardPort?: number;
}

export type BrowserTarget = LocalBrowserTarget | RemoteBrowserTarget;

// ---------------------------------------------------------------------------
// Plan results
// ---------------------------------------------------------------------------

export type TrialStatus = 'ok' | 'timeout' | 'malformed' | 'error';

export interface TrialRecord {
	index: number;
	status: TrialStatus;
	duration: number;
	version?: string;
	error?: Error;
}

/** Everything one (benchmark, target) pair produced */
export interface BenchmarkRun {
	suite: string;
	target: string;
	branch: string;
	/** Last browser version seen in this run */
	version: string | undefined;
	trials: TrialRecord[];
	results: AggregateResult;
	failedTrials: number;
}

export interface PlanResult {
	/** True only when every trial of every run produced results */
	ok: boolean;
	runs: BenchmarkRun[];
	duration: number;
}

// ---------------------------------------------------------------------------
// Publishing
// ---------------------------------------------------------------------------

export interface PublishSubmission {
	label: string;
	branch: string;
	version: string | undefined;
	/** `version` after the target's version-label policy */
	versionLabel: string | undefined;
	benchmark: BenchmarkSpec;
	results: AggregateResult;
}

/** Hands a finished run to wherever results are kept */
export interface Publisher {
	publish(submission: PublishSubmission): Promise<void>;
}
