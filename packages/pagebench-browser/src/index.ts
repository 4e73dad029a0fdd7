// ============================================================================
// pagebench browser - Public API
// Local browser launching and the WebDriver BiDi client used for devices.
// ============================================================================

export { BiDiSession, type SessionOptions } from './session.js';
export { Transport, type TransportOptions } from './transport.js';
export {
	launchBrowser,
	buildArgs,
	type BrowserName,
	type BrowserProcess,
	type BuildArgsOptions,
	type LaunchOptions,
} from './launcher.js';
export { redact, redactMessage, REDACTED } from './utils.js';
export * from './types.js';
