/**
 * Repository factory with fallback-on-failure
 *
 * Each capability (search, generation) gets a real backend built from
 * configuration and a stand-in. The wrapper starts in `real` state unless
 * the real backend cannot be built, answers failed or timed-out calls
 * with the stand-in, and can optionally demote itself to `fallback`
 * permanently after N consecutive failures.
 */

import type { AppConfig } from '@/config';
import { GenerationError, RetrievalError, describeError } from '@/errors';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import { OpenAiGenerationRepository } from './generation/openai';
import { StandInGenerationRepository } from './generation/standIn';
import type { GenerationRepository, GenerationResult, Turn } from './generation/types';
import { AzureSearchRepository } from './search/azure';
import { StandInSearchRepository } from './search/standIn';
import type { CallOptions, SearchRepository, SearchResult } from './search/types';

export type RepositoryState = 'real' | 'fallback';

export interface RepositoryStatus {
  state: RepositoryState;
  backend: string;
  reason?: string;
  consecutiveFailures: number;
}

export interface ResilienceOptions {
  timeoutMs: number;
  /** Answer failed calls with the stand-in instead of raising */
  callFallback: boolean;
  /** Consecutive failures before permanent demotion; 0 disables */
  demoteAfterFailures: number;
  /** Skip the real backend entirely */
  forceStandIn?: boolean;
}

class TimeoutError extends Error {
  constructor(ms: number) {
    super(`Timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

class ResilientBackend<T extends { readonly name: string }> {
  private state: RepositoryState = 'real';
  private reason?: string;
  private consecutiveFailures = 0;
  private readonly real?: T;

  constructor(
    private readonly capability: 'search' | 'generation',
    build: () => T,
    private readonly standIn: T,
    private readonly options: ResilienceOptions,
    private readonly errorType: typeof RetrievalError | typeof GenerationError,
    private readonly log: Logger,
  ) {
    if (options.forceStandIn) {
      this.demote('stand-ins forced by configuration');
      return;
    }
    try {
      this.real = build();
    } catch (error) {
      this.demote(`real backend unavailable: ${describeError(error)}`);
    }
  }

  status(): RepositoryStatus {
    const backend = this.state === 'real' && this.real ? this.real.name : this.standIn.name;
    return {
      state: this.state,
      backend,
      ...(this.reason ? { reason: this.reason } : {}),
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  async invoke<R>(
    operation: (backend: T, signal?: AbortSignal) => Promise<R>,
    callerSignal?: AbortSignal,
  ): Promise<R> {
    const real = this.real;
    if (this.state === 'fallback' || !real) {
      return operation(this.standIn, callerSignal);
    }

    try {
      const result = await this.withTimeout((signal) => operation(real, signal), callerSignal);
      this.consecutiveFailures = 0;
      return result;
    } catch (error) {
      this.recordFailure(error);
      if (!this.options.callFallback) {
        throw error instanceof this.errorType
          ? error
          : new this.errorType(`${this.capability} backend failed: ${describeError(error)}`, { cause: error });
      }
      this.log.warn('Backend call failed, answering with stand-in', {
        capability: this.capability,
        backend: real.name,
        error: describeError(error),
        consecutiveFailures: this.consecutiveFailures,
      });
      return operation(this.standIn, callerSignal);
    }
  }

  private async withTimeout<R>(
    run: (signal: AbortSignal) => Promise<R>,
    callerSignal?: AbortSignal,
  ): Promise<R> {
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(this.options.timeoutMs);
        controller.abort(error);
        reject(error);
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([run(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private recordFailure(error: unknown): void {
    this.consecutiveFailures += 1;
    const threshold = this.options.demoteAfterFailures;
    if (threshold > 0 && this.consecutiveFailures >= threshold) {
      this.demote(
        `${this.consecutiveFailures} consecutive failures, last: ${describeError(error)}`,
      );
    }
  }

  private demote(reason: string): void {
    this.state = 'fallback';
    this.reason = reason;
    this.log.warn('Repository switched to fallback', { capability: this.capability, reason });
  }
}

export class ResilientSearchRepository implements SearchRepository {
  private readonly backend: ResilientBackend<SearchRepository>;

  constructor(
    build: () => SearchRepository,
    standIn: SearchRepository,
    options: ResilienceOptions,
    log: Logger = rootLogger,
  ) {
    this.backend = new ResilientBackend(
      'search',
      build,
      standIn,
      options,
      RetrievalError,
      log,
    );
  }

  get name(): string {
    return this.backend.status().backend;
  }

  search(query: string, topK: number, options: CallOptions = {}): Promise<SearchResult[]> {
    return this.backend.invoke((repo, signal) => repo.search(query, topK, { signal }), options.signal);
  }

  status(): RepositoryStatus {
    return this.backend.status();
  }
}

export class ResilientGenerationRepository implements GenerationRepository {
  private readonly backend: ResilientBackend<GenerationRepository>;

  constructor(
    build: () => GenerationRepository,
    standIn: GenerationRepository,
    options: ResilienceOptions,
    log: Logger = rootLogger,
  ) {
    this.backend = new ResilientBackend(
      'generation',
      build,
      standIn,
      options,
      GenerationError,
      log,
    );
  }

  get name(): string {
    return this.backend.status().backend;
  }

  generate(
    turns: Turn[],
    evidence: SearchResult[],
    temperature: number,
    options: CallOptions = {},
  ): Promise<GenerationResult> {
    return this.backend.invoke(
      (repo, signal) => repo.generate(turns, evidence, temperature, { signal }),
      options.signal,
    );
  }

  status(): RepositoryStatus {
    return this.backend.status();
  }
}

export interface Repositories {
  search: ResilientSearchRepository;
  generation: ResilientGenerationRepository;
}

export function createRepositories(
  config: AppConfig,
  deps: { fetchImpl?: typeof fetch; logger?: Logger } = {},
): Repositories {
  const log = (deps.logger ?? rootLogger).child({ component: 'repositories' });
  const fetchImpl = deps.fetchImpl ?? fetch;
  const shared = {
    callFallback: config.resilience.callFallback,
    demoteAfterFailures: config.resilience.demoteAfterFailures,
    forceStandIn: config.useStandIns,
  };

  return {
    search: new ResilientSearchRepository(
      () => new AzureSearchRepository(config.search, fetchImpl),
      new StandInSearchRepository(),
      { ...shared, timeoutMs: config.resilience.searchTimeoutMs },
      log,
    ),
    generation: new ResilientGenerationRepository(
      () => new OpenAiGenerationRepository(config.generation, fetchImpl),
      new StandInGenerationRepository(),
      { ...shared, timeoutMs: config.resilience.generationTimeoutMs },
      log,
    ),
  };
}
