import { type ExecuteRequest, type ExecuteResult, type ExecutionEngine } from '@kernelkit/core';

export interface FakeExecutionEngineOptions {
    /** Runs inside `start()`; reject to simulate a failed start. */
    onStart?: () => Promise<void>;
    /** Computes results; defaults to echoing the code back. */
    respond?: (request: ExecuteRequest) => Promise<ExecuteResult> | ExecuteResult;
}

export class FakeExecutionEngine implements ExecutionEngine {
    public startCalls = 0;
    public closeCalls = 0;
    public readonly requests: ExecuteRequest[] = [];
    private readonly options: FakeExecutionEngineOptions;

    public constructor(options: FakeExecutionEngineOptions = {}) {
        this.options = options;
    }

    public async start(): Promise<void> {
        this.startCalls++;
        await this.options.onStart?.();
    }

    public async close(): Promise<void> {
        this.closeCalls++;
    }

    public async execute(request: ExecuteRequest): Promise<ExecuteResult> {
        this.requests.push(request);
        if (this.options.respond) {
            return this.options.respond(request);
        }
        return { status: 'ok', output: request.code };
    }
}
