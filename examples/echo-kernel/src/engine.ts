import type { ExecuteRequest, ExecuteResult, ExecutionEngine, Logger } from 'kernelkit';

/**
 * Replies to every cell with its own source. `%upper` on the first line
 * upper-cases the rest of the cell; any other `%` magic is an error.
 */
export class EchoEngine implements ExecutionEngine {
  private readonly logger: Logger;

  public constructor(logger: Logger) {
    this.logger = logger;
  }

  public async start(): Promise<void> {
    this.logger.debug('echo engine ready');
  }

  public async close(): Promise<void> {
    this.logger.debug('echo engine closed');
  }

  public async execute(request: ExecuteRequest): Promise<ExecuteResult> {
    const [first = '', ...rest] = request.code.split('\n');
    if (!first.startsWith('%')) {
      return { status: 'ok', output: request.code };
    }

    const magic = first.slice(1).trim();
    if (magic === 'upper') {
      return { status: 'ok', output: rest.join('\n').toUpperCase() };
    }
    return { status: 'error', errorName: 'UnknownMagic', errorValue: `unknown magic %${magic}` };
  }
}
