import {
  BaseEngine,
  EngineFailure,
  PipelineErrorCode,
  ServiceTimeout,
  withRetry,
  withTimeout,
  type EngineCallOptions,
  type EngineOutput,
  type ExtractionMethod,
} from '@advice-corpus/shared';

const SOURCE = { pdfPath: '/letters/test.pdf', pageImages: [] };
const CTX = { registryKey: 'reg-0001', year: 2003 };

type Step = EngineOutput | Error | 'hang';

class ScriptedEngine extends BaseEngine {
  readonly role = 'text-layer' as const;
  readonly method: ExtractionMethod = 'text-layer';
  readonly description = 'Scripted text layer';
  calls = 0;

  constructor(private readonly steps: Step[], options: EngineCallOptions) {
    super(options);
  }

  protected async transcribe(): Promise<EngineOutput> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    if (step === 'hang') return new Promise<EngineOutput>(() => undefined);
    if (step instanceof Error) throw step;
    return step;
  }
}

const OUTPUT: EngineOutput = {
  pages: ['  First page.  ', '', 'Third page.\n'],
  pageCount: 2,
  cost: null,
  model: null,
};

describe('withRetry', () => {
  it('returns once a call succeeds', async () => {
    let calls = 0;
    const onRetry = jest.fn();
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`failure ${calls}`);
        return 'done';
      },
      { baseDelayMs: 1, onRetry }
    );

    expect(result).toBe('done');
    expect(onRetry.mock.calls.map(([error, attempt]) => [error.message, attempt])).toEqual([
      ['failure 1', 1],
      ['failure 2', 2],
    ]);
  });

  it('rethrows the last error when retries run out', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        { maxRetries: 1, baseDelayMs: 1 }
      )
    ).rejects.toThrow('failure 2');
    expect(calls).toBe(2);
  });
});

describe('withTimeout', () => {
  it('rejects a call that does not settle in time', async () => {
    const pending = new Promise<string>(() => undefined);
    const result = withTimeout(pending, 10, 'slow call');
    await expect(result).rejects.toBeInstanceOf(ServiceTimeout);
    await expect(withTimeout(pending, 10, 'slow call')).rejects.toThrow('slow call exceeded 10ms');
  });

  it('passes through a value that arrives first', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, 'fast call')).resolves.toBe(7);
  });
});

describe('BaseEngine', () => {
  const options = { timeoutMs: 1000, maxRetries: 2, backoffMs: 1 };

  it('trims pages and joins the non-empty ones', async () => {
    const attempt = await new ScriptedEngine([OUTPUT], options).attempt(SOURCE, CTX);

    expect(attempt.text).toBe('First page.\n\nThird page.');
    expect(attempt.pages).toEqual(['First page.', '', 'Third page.']);
    expect(attempt.page_count).toBe(3);
    expect(attempt.word_count).toBe(4);
    expect(attempt.method).toBe('text-layer');
    expect(attempt.pass).toBe('standard');
    expect(Object.isFrozen(attempt)).toBe(true);
  });

  it('retries a failing call', async () => {
    const engine = new ScriptedEngine([new Error('flaky'), OUTPUT], options);
    const attempt = await engine.attempt(SOURCE, CTX);

    expect(engine.calls).toBe(2);
    expect(attempt.word_count).toBe(4);
  });

  it('wraps exhausted retries in EngineFailure', async () => {
    const engine = new ScriptedEngine([new Error('boom')], options);
    const failure = engine.attempt(SOURCE, CTX);

    await expect(failure).rejects.toBeInstanceOf(EngineFailure);
    await expect(failure).rejects.toThrow('Engine text-layer failed: boom');
    expect(engine.calls).toBe(3);
  });

  it('reports a timeout as the cause', async () => {
    const engine = new ScriptedEngine(['hang'], { timeoutMs: 10, maxRetries: 0, backoffMs: 1 });

    const error = await engine.attempt(SOURCE, CTX).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineFailure);
    expect(error).toMatchObject({
      code: PipelineErrorCode.ENGINE_FAILED,
      message: 'Engine text-layer failed: text-layer engine exceeded 10ms',
      details: { engine: 'text-layer', causeCode: PipelineErrorCode.SERVICE_TIMEOUT },
    });
  });
});
