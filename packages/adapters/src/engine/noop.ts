import { type ExecuteResult, type ExecutionEngine } from '@kernelkit/core';

/**
 * Engine that accepts every request and produces no output.
 */
export class NoopExecutionEngine implements ExecutionEngine {
    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public async execute(): Promise<ExecuteResult> {
        return { status: 'ok', output: null };
    }
}
