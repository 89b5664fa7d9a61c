/**
 * Enterprise list view-model.
 *
 * Loads enterprises through one single-flight path shared by the initial
 * load, manual refresh and the auto-refresh timer. Each load reports six
 * named steps, retries transient repository failures, and gives up on the
 * query after `config.timeout` without touching the list.
 */

import {
  dispatchedList,
  emitter,
  executeWithRetry,
  getDefaultLogger,
  immediateDispatcher,
  isCancellation,
  linkSignals,
  operationExecutor,
  raceTimeout,
  resolveConfig,
  singleFlight,
  stepProgress,
  throwIfCancelled,
  withFields,
  type Disposable,
  type DispatchedList,
  type Dispatcher,
  type ErrorReporter,
  type Listener,
  type LoadflightConfig,
  type Logger,
  type OperationExecutor,
  type ProgressStepInit,
  type SleepFn,
  type StepProgress,
  type Unsubscribe,
} from "loadflight";
import type { EnterpriseRepository } from "../data/repositories";
import { createSampleEnterprises } from "../data/sampleData";
import {
  budgetSummary,
  type BudgetSummary,
  type Enterprise,
  type EnterpriseDraft,
} from "../types";

// =============================================================================
// Types
// =============================================================================

export type LoadTrigger = "manual" | "timer";

/**
 * How a load ended.
 *
 * - `loaded`: repository records are shown
 * - `sample`: the repository was empty and sample records are shown
 * - `timedOut`: the query outlived `config.timeout`; the list is unchanged
 * - `cancelled`: cancelled by the user or by `cancel()`
 * - `failed`: the load failed and fallback sample records are shown
 * - `skipped`: another load was already running
 */
export type LoadOutcome =
  | "loaded"
  | "sample"
  | "timedOut"
  | "cancelled"
  | "failed"
  | "skipped";

export interface EnterpriseViewState {
  readonly selected: Enterprise | undefined;
  readonly timedOut: boolean;
  readonly usingSampleData: boolean;
  readonly autoRefreshing: boolean;
}

export interface EnterpriseViewModelOptions {
  repository: EnterpriseRepository;
  /** UI context list writes and error reports run on */
  dispatcher?: Dispatcher;
  logger?: Logger;
  errorReporter?: ErrorReporter;
  config?: Partial<LoadflightConfig>;
  /** Backoff sleep for repository retries */
  sleep?: SleepFn;
  /** Correlation id attached to every log entry of one load */
  createLoadId?: () => string;
}

export interface EnterpriseViewModel extends Disposable {
  readonly enterprises: DispatchedList<Enterprise>;
  readonly progress: StepProgress;
  readonly executor: OperationExecutor;

  getState(): EnterpriseViewState;
  subscribe(listener: Listener<EnterpriseViewState>): Unsubscribe;

  loadEnterprises(trigger?: LoadTrigger): Promise<LoadOutcome>;
  refresh(): Promise<LoadOutcome>;
  /** Cancel the running load; later loads start normally */
  cancel(): void;

  startAutoRefresh(interval?: number): void;
  stopAutoRefresh(): void;

  addEnterprise(draft?: Partial<EnterpriseDraft>): Promise<Enterprise>;
  /**
   * Persist the selection with `changes` applied.
   * @returns the saved enterprise, or `undefined` without a selection
   */
  saveSelected(changes?: Partial<EnterpriseDraft>): Promise<Enterprise | undefined>;
  deleteSelected(): Promise<boolean>;
  select(id: number | undefined): void;

  summary(): BudgetSummary | undefined;
}

export const enterpriseLoadSteps: readonly ProgressStepInit[] = [
  { title: "Initializing", description: "Preparing to load enterprise data" },
  { title: "Connecting", description: "Establishing database connection" },
  { title: "Querying", description: "Executing database query with retry logic" },
  { title: "Processing", description: "Processing retrieved enterprise data" },
  { title: "Updating", description: "Updating user interface with loaded data" },
  { title: "Finalizing", description: "Completing enterprise data load" },
];

const newEnterprise: EnterpriseDraft = {
  name: "New Enterprise",
  type: "",
  currentRate: 0,
  citizenCount: 0,
  monthlyExpenses: 0,
  totalBudget: 0,
  notes: "New enterprise - update details",
};

const randomLoadId = () => Math.random().toString(16).slice(2, 10).padEnd(8, "0");

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

// =============================================================================
// Implementation
// =============================================================================

export function enterpriseViewModel(
  options: EnterpriseViewModelOptions
): EnterpriseViewModel {
  const { repository, errorReporter, sleep } = options;
  const dispatcher = options.dispatcher ?? immediateDispatcher();
  const logger = options.logger ?? getDefaultLogger();
  const config = resolveConfig(options.config);
  const createLoadId = options.createLoadId ?? randomLoadId;

  const enterprises = dispatchedList<Enterprise>(dispatcher, {
    equality: (a, b) => a.id === b.id,
  });
  const progress = stepProgress({ logger });
  const executor = operationExecutor({
    name: "enterprises",
    dispatcher,
    logger,
    errorReporter,
  });
  const guard = singleFlight({ name: "Enterprise loading", logger });
  const changes = emitter<EnterpriseViewState>();

  let state: EnterpriseViewState = Object.freeze({
    selected: undefined,
    timedOut: false,
    usingSampleData: false,
    autoRefreshing: false,
  });
  let refreshTimer: ReturnType<typeof setInterval> | undefined;

  const setState = (patch: Partial<EnterpriseViewState>) => {
    state = Object.freeze({ ...state, ...patch });
    changes.emit(state);
  };

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  const queryAndShow = async (
    log: Logger,
    operationSignal: AbortSignal
  ): Promise<LoadOutcome> => {
    const linked = linkSignals(operationSignal, progress.signal);
    const { signal } = linked;

    try {
      progress.update(0, "Initializing enterprise data load...");
      log.info("Executing repository query with retry logic");
      progress.update(1, "Connecting to database...");

      const query = executeWithRetry(() => repository.getAll(signal), {
        maxRetries: config.maxRetries,
        baseDelay: config.baseDelay,
        maxDelay: config.maxDelay,
        jitter: config.jitter,
        signal,
        logger: log,
        sleep,
      });
      const outcome = await raceTimeout(query, config.timeout, signal);

      if (outcome.status === "timedOut") {
        log.warn(`Database query timed out after ${outcome.after}ms`);
        progress.fail("Database query timed out");
        setState({ timedOut: true });
        return "timedOut";
      }

      const records = outcome.value;
      throwIfCancelled(signal);

      progress.update(2, `Query completed - found ${records.length} enterprises`);
      log.info("Repository query completed", { count: records.length });

      progress.update(3, "Processing enterprise data...");
      await enterprises.replaceAll(records);
      throwIfCancelled(signal);

      progress.update(4, "Updating user interface...");
      let result: LoadOutcome = "loaded";
      if (enterprises.length === 0) {
        log.info("No enterprises found, adding sample data");
        progress.update(4, "No enterprises found - adding sample data...");
        await enterprises.addRange(createSampleEnterprises());
        result = "sample";
      }
      throwIfCancelled(signal);

      progress.update(5, "Completing enterprise data load...");
      log.info("Enterprise data load completed successfully");
      progress.complete();
      setState({ usingSampleData: result === "sample" });
      return result;
    } catch (error) {
      // A user cancel has already settled the tracker
      if (progress.getState().inProgress) {
        progress.fail(
          isCancellation(error) || signal.aborted
            ? "Operation was cancelled"
            : `Load failed: ${errorMessage(error)}`
        );
      }
      throw error;
    } finally {
      // Abandon a query that lost the timeout race
      linked.abort();
    }
  };

  const runLoad = async (log: Logger): Promise<LoadOutcome> => {
    progress.start("Loading Enterprises", enterpriseLoadSteps);
    setState({ timedOut: false });

    try {
      return await executor.execute(
        ({ signal }) => queryAndShow(log, signal),
        { statusMessage: "Loading enterprises..." }
      );
    } catch (error) {
      if (isCancellation(error)) {
        log.info("Enterprise loading was cancelled");
        return "cancelled";
      }

      log.error("Enterprise loading failed, adding fallback sample data", {
        error,
      });
      await enterprises.replaceAll(createSampleEnterprises());
      setState({ usingSampleData: true });
      return "failed";
    }
  };

  const loadEnterprises = async (
    trigger: LoadTrigger = "manual"
  ): Promise<LoadOutcome> => {
    const loadId = createLoadId();
    const log = withFields(logger, { loadId });
    log.info("Starting enterprise data load", { trigger });

    const result = await guard.run(() => runLoad(log), { loadId, trigger });
    return result.status === "skipped" ? "skipped" : result.value;
  };

  // ---------------------------------------------------------------------------
  // Auto-refresh
  // ---------------------------------------------------------------------------

  const stopAutoRefresh = () => {
    if (refreshTimer === undefined) return;
    clearInterval(refreshTimer);
    refreshTimer = undefined;
    setState({ autoRefreshing: false });
  };

  const startAutoRefresh = (interval = config.refreshInterval) => {
    stopAutoRefresh();
    refreshTimer = setInterval(() => {
      loadEnterprises("timer").catch((error: unknown) => {
        logger.error("Auto-refresh failed", { error });
      });
    }, interval);
    setState({ autoRefreshing: true });
    logger.debug("Auto-refresh started", { interval });
  };

  // ---------------------------------------------------------------------------
  // Editing
  // ---------------------------------------------------------------------------

  const select = (id: number | undefined) => {
    const selected =
      id === undefined
        ? undefined
        : enterprises.items.find((enterprise) => enterprise.id === id);
    if (selected === state.selected) return;
    setState({ selected });
  };

  const addEnterprise = (draft: Partial<EnterpriseDraft> = {}) =>
    executor.execute(
      async () => {
        const added = await repository.add({ ...newEnterprise, ...draft });
        await enterprises.add(added);
        select(added.id);
        return added;
      },
      { statusMessage: "Adding enterprise..." }
    );

  const saveSelected = async (changes: Partial<EnterpriseDraft> = {}) => {
    const { selected } = state;
    if (!selected) return undefined;

    return executor.execute(
      async () => {
        const saved = await repository.update({ ...selected, ...changes });
        await enterprises.replaceAll(
          enterprises.items.map((enterprise) =>
            enterprise.id === saved.id ? saved : enterprise
          )
        );
        setState({ selected: saved });
        logger.info("Saved enterprise", { id: saved.id, name: saved.name });
        return saved;
      },
      { statusMessage: "Saving enterprise changes..." }
    );
  };

  const deleteSelected = async () => {
    const { selected } = state;
    if (!selected) return false;

    return executor.execute(
      async () => {
        const deleted = await repository.delete(selected.id);
        if (deleted) {
          await enterprises.remove(selected);
          select(enterprises.at(0)?.id);
        }
        return deleted;
      },
      { statusMessage: "Deleting enterprise..." }
    );
  };

  return {
    enterprises,
    progress,
    executor,

    getState: () => state,
    subscribe: (listener) => changes.on(listener),

    loadEnterprises,
    refresh: () => loadEnterprises("manual"),
    cancel() {
      executor.resetCancellation();
    },

    startAutoRefresh,
    stopAutoRefresh,

    addEnterprise,
    saveSelected,
    deleteSelected,
    select,

    summary: () => budgetSummary(enterprises.items),

    dispose() {
      stopAutoRefresh();
      executor.dispose();
      guard.dispose();
      progress.reset();
      changes.clear();
    },
  };
}
