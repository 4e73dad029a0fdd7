// ============================================================================
// pagebench runner - Public API
// Result channel, browser runners, trial engine, aggregation and the plan
// driver that ties them together.
// ============================================================================

export { BenchmarkPlan, type PlanOptions } from './plan.js';
export { runTrial } from './engine.js';
export { ResultChannel, parseResultSet, type PostbackSignal } from './result-channel.js';
export { ResultAggregator, toPlainResults, type ValueStats } from './result-aggregator.js';
export { EventBus, type EventListener, type PlanEvents, type TrialRef } from './event-bus.js';
export {
	LocalProcessRunner,
	RemoteSessionRunner,
	adbForward,
	createRunner,
	type BrowserRunner,
	type LocalRunnerOptions,
	type RemoteRunnerOptions,
	type RemoteSession,
	type RunnerFactory,
} from './runners.js';
export { extractBrowserVersion, formatVersionLabel, userAgentOf } from './version.js';
export { PagebenchError, PostbackError, RunnerStartError, toError } from './errors.js';
export type * from './types.js';
