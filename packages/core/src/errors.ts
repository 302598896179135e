/**
 * Errors
 *
 * Every error raised by the harness extends FaultlineError so callers can tell
 * harness failures apart from failures of the client under test.
 */

export class FaultlineError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "FaultlineError";
	}
}

/**
 * An expected network event never arrived.
 */
export class WaitTimeoutError extends FaultlineError {
	readonly timeoutMs: number;

	constructor(message: string, timeoutMs: number) {
		super(`${message} (timed out after ${timeoutMs}ms)`);
		this.name = "WaitTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

/**
 * A filter expression could not be parsed.
 */
export class FilterSyntaxError extends FaultlineError {
	readonly expression: string;

	constructor(expression: string, reason: string) {
		super(`Invalid filter expression "${expression}": ${reason}`);
		this.name = "FilterSyntaxError";
		this.expression = expression;
	}
}

/**
 * A rule set was rejected at the boundary (unknown keys, wrong types, bad filter).
 */
export class RuleValidationError extends FaultlineError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid rule set: ${issues.join("; ")}`);
		this.name = "RuleValidationError";
		this.issues = issues;
	}
}

/**
 * The administrative call was rejected or the proxy was unreachable.
 */
export class RulePushError extends FaultlineError {
	readonly status?: number;

	constructor(message: string, options?: { status?: number; cause?: unknown }) {
		super(message, { cause: options?.cause });
		this.name = "RulePushError";
		this.status = options?.status;
	}
}

/**
 * A process never became ready; the whole deployment is aborted.
 */
export class ProvisioningError extends FaultlineError {
	readonly service: string;

	constructor(service: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Failed to provision ${service}: ${reason}`, { cause });
		this.name = "ProvisioningError";
		this.service = service;
	}
}
