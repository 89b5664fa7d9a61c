/**
 * Municipal account view-model.
 *
 * Accounts are streamed into the list in batches so the view can render
 * early rows while the rest arrive; percentage progress follows the batches.
 * The first batch replaces the previous contents, and a load that is
 * cancelled or fails part-way puts the previous contents back.
 */

import {
  dispatchedList,
  emitter,
  executeWithRetry,
  getDefaultLogger,
  immediateDispatcher,
  isCancellation,
  operationExecutor,
  progressReporter,
  resolveConfig,
  singleFlight,
  type Disposable,
  type DispatchedList,
  type Dispatcher,
  type ErrorReporter,
  type Listener,
  type LoadflightConfig,
  type Logger,
  type OperationExecutor,
  type ProgressReporter,
  type SleepFn,
  type Unsubscribe,
} from "loadflight";
import type { MunicipalAccountRepository } from "../data/repositories";
import type { AccountType, FundType, MunicipalAccount } from "../types";

export interface AccountViewState {
  readonly statusMessage: string;
  readonly hasError: boolean;
  readonly errorMessage: string;
}

export interface MunicipalAccountViewModelOptions {
  repository: MunicipalAccountRepository;
  dispatcher?: Dispatcher;
  logger?: Logger;
  errorReporter?: ErrorReporter;
  config?: Partial<LoadflightConfig>;
  /** Accounts appended per list change (default: 50) */
  batchSize?: number;
  sleep?: SleepFn;
}

export interface MunicipalAccountViewModel extends Disposable {
  readonly accounts: DispatchedList<MunicipalAccount>;
  /** Accounts with a budget, for variance views */
  readonly budgetAnalysis: DispatchedList<MunicipalAccount>;
  readonly progress: ProgressReporter;
  readonly executor: OperationExecutor;

  getState(): AccountViewState;
  subscribe(listener: Listener<AccountViewState>): Unsubscribe;

  /**
   * Load active accounts.
   * @returns the number loaded, or `undefined` when skipped, cancelled or failed
   */
  loadAccounts(): Promise<number | undefined>;
  /**
   * Show the active accounts of one fund.
   * @returns the number shown, or `undefined` when cancelled or failed
   */
  filterByFund(fund: FundType): Promise<number | undefined>;
  /** Show the active accounts of one type */
  filterByType(type: AccountType): Promise<number | undefined>;
  /** Fill `budgetAnalysis`; `accounts` is left as it is */
  loadBudgetAnalysis(): Promise<number | undefined>;
  clearError(): void;
}

interface QueryMessages {
  running: string;
  done: (count: number) => string;
  failed: string;
  errorPrefix: string;
}

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export function municipalAccountViewModel(
  options: MunicipalAccountViewModelOptions
): MunicipalAccountViewModel {
  const { repository, sleep } = options;
  const dispatcher = options.dispatcher ?? immediateDispatcher();
  const logger = options.logger ?? getDefaultLogger();
  const config = resolveConfig(options.config);
  const batchSize = options.batchSize ?? 50;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const accounts = dispatchedList<MunicipalAccount>(dispatcher);
  const budgetAnalysis = dispatchedList<MunicipalAccount>(dispatcher);
  const progress = progressReporter();
  const executor = operationExecutor({
    name: "accounts",
    dispatcher,
    logger,
    errorReporter: options.errorReporter,
  });
  const guard = singleFlight({ name: "Account loading", logger });
  const changes = emitter<AccountViewState>();

  let state: AccountViewState = Object.freeze({
    statusMessage: "Ready",
    hasError: false,
    errorMessage: "",
  });

  const setState = (patch: Partial<AccountViewState>) => {
    state = Object.freeze({ ...state, ...patch });
    changes.emit(state);
  };

  const streamAccounts = () =>
    executor.execute(
      async ({ signal, throwIfCancelled }) => {
        const loaded = await executeWithRetry(
          () => repository.getActive(signal),
          {
            maxRetries: config.maxRetries,
            baseDelay: config.baseDelay,
            maxDelay: config.maxDelay,
            jitter: config.jitter,
            signal,
            logger,
            sleep,
          }
        );

        for (let start = 0; start < loaded.length; start += batchSize) {
          throwIfCancelled();
          const end = Math.min(start + batchSize, loaded.length);
          const batch = loaded.slice(start, end);
          await (start === 0 ? accounts.replaceAll(batch) : accounts.addRange(batch));
          progress.report(
            `Loaded ${end} of ${loaded.length} accounts`,
            (end / loaded.length) * 100
          );
        }
        if (loaded.length === 0) {
          await accounts.clear();
        }
        return loaded.length;
      },
      { progress, statusMessage: "Loading accounts..." }
    );

  const loadAccounts = async () => {
    const result = await guard.run(async () => {
      setState({
        statusMessage: "Loading accounts...",
        hasError: false,
        errorMessage: "",
      });
      const previous = accounts.items;

      try {
        const count = await streamAccounts();
        setState({ statusMessage: `Loaded ${count} accounts successfully` });
        logger.info("Loaded municipal accounts", { count });
        return count;
      } catch (error) {
        if (accounts.items !== previous) {
          await accounts.replaceAll(previous);
        }
        if (isCancellation(error)) {
          setState({ statusMessage: "Load cancelled" });
          return undefined;
        }
        setState({
          statusMessage: "Load failed",
          hasError: true,
          errorMessage: `Failed to load accounts: ${errorMessage(error)}`,
        });
        return undefined;
      }
    });

    return result.status === "completed" ? result.value : undefined;
  };

  // Replace one list with a repository query
  const showQuery = async (
    target: DispatchedList<MunicipalAccount>,
    query: (signal: AbortSignal) => Promise<MunicipalAccount[]>,
    messages: QueryMessages
  ) => {
    setState({ statusMessage: messages.running, hasError: false, errorMessage: "" });

    try {
      const count = await executor.execute(
        async ({ signal, throwIfCancelled }) => {
          const found = await query(signal);
          throwIfCancelled();
          await target.replaceAll(found);
          return found.length;
        },
        { statusMessage: messages.running }
      );
      setState({ statusMessage: messages.done(count) });
      return count;
    } catch (error) {
      if (isCancellation(error)) {
        setState({ statusMessage: "Operation cancelled" });
        return undefined;
      }
      setState({
        statusMessage: messages.failed,
        hasError: true,
        errorMessage: `${messages.errorPrefix}: ${errorMessage(error)}`,
      });
      return undefined;
    }
  };

  return {
    accounts,
    budgetAnalysis,
    progress,
    executor,

    getState: () => state,
    subscribe: (listener) => changes.on(listener),

    loadAccounts,

    filterByFund: (fund) =>
      showQuery(accounts, (signal) => repository.getByFund(fund, signal), {
        running: `Filtering by ${fund} fund...`,
        done: (count) => `Filtered to ${count} ${fund} accounts`,
        failed: "Filter failed",
        errorPrefix: "Failed to filter accounts",
      }),

    filterByType: (type) =>
      showQuery(accounts, (signal) => repository.getByType(type, signal), {
        running: `Filtering by ${type} type...`,
        done: (count) => `Filtered to ${count} ${type} accounts`,
        failed: "Filter failed",
        errorPrefix: "Failed to filter accounts",
      }),

    loadBudgetAnalysis: () =>
      showQuery(budgetAnalysis, (signal) => repository.getBudgetAnalysis(signal), {
        running: "Loading budget analysis...",
        done: (count) => `Loaded budget analysis for ${count} accounts`,
        failed: "Budget analysis failed",
        errorPrefix: "Failed to load budget analysis",
      }),

    clearError() {
      setState({ hasError: false, errorMessage: "", statusMessage: "Ready" });
    },

    dispose() {
      executor.dispose();
      guard.dispose();
      changes.clear();
    },
  };
}
