// ============================================================================
// pagebench - Publishers
// Where finished runs go: JSON files on disk, a remote results service, or
// both.
// ============================================================================

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { arch, hostname, platform, release } from 'node:os';
import { join } from 'node:path';
import { type PublishSubmission, type Publisher, toError, toPlainResults } from 'pagebench-runner';
import { PublishError } from './errors.js';

/** What a published run looks like on disk and on the wire */
export interface PublishedRun {
	suite: string;
	label: string;
	branch: string;
	version: string | null;
	versionLabel: string | null;
	results: Record<string, number[]>;
}

function toPublishedRun(submission: PublishSubmission): PublishedRun {
	return {
		suite: submission.benchmark.suite,
		label: submission.label,
		branch: submission.branch,
		version: submission.version ?? null,
		versionLabel: submission.versionLabel ?? null,
		results: toPlainResults(submission.results),
	};
}

// ---------------------------------------------------------------------------
// JSON files
// ---------------------------------------------------------------------------

/**
 * Writes each run to `<outputDir>/<suite>-<label>.json`, replacing the
 * previous file for the same pair.
 */
export class JsonFilePublisher implements Publisher {
	constructor(private readonly outputDir: string) {}

	/** File a submission is written to */
	pathFor(submission: PublishSubmission): string {
		return join(this.outputDir, `${safeName(submission.benchmark.suite)}-${safeName(submission.label)}.json`);
	}

	async publish(submission: PublishSubmission): Promise<void> {
		const file = this.pathFor(submission);
		try {
			await mkdir(this.outputDir, { recursive: true });
			await writeFile(file, `${JSON.stringify(toPublishedRun(submission), null, 2)}\n`, 'utf-8');
		} catch (err) {
			throw new PublishError('json', `Could not write ${file}: ${toError(err).message}`, { cause: err });
		}
	}
}

function safeName(name: string): string {
	return name.replace(/[^\w.-]+/g, '_');
}

// ---------------------------------------------------------------------------
// Results service
// ---------------------------------------------------------------------------

/** The machine a run was measured on */
export interface MachineInfo {
	name: string;
	os: string;
	osVersion: string;
	arch: string;
}

export function machineInfo(): MachineInfo {
	return { name: hostname(), os: platform(), osVersion: release(), arch: arch() };
}

export interface ResultsServiceOptions {
	/** Endpoint runs are POSTed to */
	url: string;
	/** File holding `key,secret` */
	secretsFile: string;
	/** Defaults to the machine this process runs on */
	machine?: MachineInfo;
	/** Clock used for build ids (default: Date.now) */
	now?: () => number;
	/** HTTP client (default: global fetch) */
	fetch?: typeof fetch;
}

/** Request body sent to the results service */
export interface ResultsServiceBody {
	machine: MachineInfo;
	build: {
		/** Browser label, e.g. 'firefox' */
		name: string;
		/** Version after the target's label policy */
		version: string;
		branch: string;
		/** Full browser version */
		revision: string;
		/** Unix seconds at publish time */
		id: string;
	};
	suite: string;
	results: Record<string, number[]>;
}

/**
 * POSTs each run as JSON with basic auth read from a `key,secret` file.
 */
export class ResultsServicePublisher implements Publisher {
	private readonly machine: MachineInfo;
	private readonly now: () => number;
	private readonly fetch: typeof fetch;

	constructor(private readonly options: ResultsServiceOptions) {
		this.machine = options.machine ?? machineInfo();
		this.now = options.now ?? Date.now;
		this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
	}

	async publish(submission: PublishSubmission): Promise<void> {
		const { version } = submission;
		if (version === undefined) {
			throw new PublishError('results-service', 'No browser version was reported, so the build cannot be labelled', {
				hint: 'The results page must be posted by the browser itself so its user-agent is seen.',
			});
		}

		const { key, secret } = await this.readSecrets();
		const body = this.buildBody(submission, version);

		let response: Response;
		try {
			response = await this.fetch(this.options.url, {
				method: 'POST',
				headers: {
					'content-type': 'application/json',
					authorization: `Basic ${Buffer.from(`${key}:${secret}`).toString('base64')}`,
				},
				body: JSON.stringify(body),
			});
		} catch (err) {
			throw new PublishError('results-service', `Request to ${this.options.url} failed: ${toError(err).message}`, {
				cause: err,
			});
		}

		if (!response.ok) {
			throw new PublishError(
				'results-service',
				`${this.options.url} answered ${response.status} ${response.statusText}`.trimEnd(),
			);
		}
	}

	/** The body posted for a submission */
	buildBody(submission: PublishSubmission, version: string): ResultsServiceBody {
		return {
			machine: this.machine,
			build: {
				name: submission.label,
				version: submission.versionLabel ?? version,
				branch: submission.branch,
				revision: version,
				id: String(Math.floor(this.now() / 1000)),
			},
			suite: submission.benchmark.suite,
			results: toPlainResults(submission.results),
		};
	}

	private async readSecrets(): Promise<{ key: string; secret: string }> {
		const { secretsFile } = this.options;

		let text: string;
		try {
			text = await readFile(secretsFile, 'utf-8');
		} catch (err) {
			throw new PublishError('results-service', `Secrets file ${secretsFile} not found`, {
				hint: 'Create it with a single line: <key>,<secret>',
				cause: err,
			});
		}

		const [key, secret, ...rest] = text.trim().split(',');
		if (!key || !secret || rest.length > 0) {
			throw new PublishError('results-service', `Secrets file ${secretsFile} must hold exactly "<key>,<secret>"`);
		}
		return { key: key.trim(), secret: secret.trim() };
	}
}

// ---------------------------------------------------------------------------
// Fan-out
// ---------------------------------------------------------------------------

/**
 * Publishes to every publisher, even after one fails; then reports all
 * failures in one error.
 */
export class MultiPublisher implements Publisher {
	constructor(private readonly publishers: readonly Publisher[]) {}

	async publish(submission: PublishSubmission): Promise<void> {
		const failures: Error[] = [];
		for (const publisher of this.publishers) {
			try {
				await publisher.publish(submission);
			} catch (err) {
				failures.push(toError(err));
			}
		}

		if (failures.length === 1 && failures[0]) {
			throw failures[0];
		}
		if (failures.length > 1) {
			throw new PublishError('multi', failures.map((f) => f.message.split('\n')[0]).join('; '), {
				cause: new AggregateError(failures),
			});
		}
	}
}
