// Every failure here propagates to the single dispatch point, which prints it and exits 1

export class ExampleFailure extends Error {
	constructor(message: string, public example: number) {
		super(message);
		this.name = new.target.name;
	}
}

export class ExecutionFailure extends ExampleFailure {
	constructor(example: number, public script: string, public code: number, public stdout: string, public stderr: string) {
		super(`Example ${example} failed (${code}): $ ${script}\nstdout: ${stdout}\nstderr: ${stderr}`, example);
	}
}

export class TimeoutFailure extends ExampleFailure {
	constructor(example: number, public script: string, public timeout: number) {
		super(`Example ${example} timed out after ${timeout}s: $ ${script}`, example);
	}
}

export class VerificationFailure extends ExampleFailure {
	constructor(example: number, public script: string, public expected: string, public received: string, diff: string) {
		super(`Example ${example}: $ ${script}\nExpected: ${JSON.stringify(expected)}\nReceived: ${JSON.stringify(received)}\n${diff}`, example);
	}
}

export class InteractiveFailure extends ExampleFailure {
	constructor(example: number, public source: string, public expected: string, public received: string) {
		super(`Example ${example}: >>> ${source}\nExpected: ${JSON.stringify(expected)}\nReceived: ${JSON.stringify(received)}`, example);
	}
}

// Tool-author mistakes: reserved names, colliding targets, bad flag combinations
export class GuardViolation extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'GuardViolation';
	}
}

export function errorCode(error: unknown): string | undefined {
	if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string')
		return error.code;
}
