/**
 * Repository seams the view-models load through.
 *
 * The in-memory implementations keep their records in insertion order and
 * let tests script latency and failures per call.
 */

import type {
  AccountType,
  Enterprise,
  EnterpriseDraft,
  FundType,
  MunicipalAccount,
} from "../types";

export interface EnterpriseRepository {
  getAll(signal?: AbortSignal): Promise<Enterprise[]>;
  add(draft: EnterpriseDraft): Promise<Enterprise>;
  /** Rejects when no enterprise has the id */
  update(enterprise: Enterprise): Promise<Enterprise>;
  /** Resolves `false` when no enterprise has the id */
  delete(id: number): Promise<boolean>;
}

export interface MunicipalAccountRepository {
  getActive(signal?: AbortSignal): Promise<MunicipalAccount[]>;
  getByFund(fund: FundType, signal?: AbortSignal): Promise<MunicipalAccount[]>;
  getByType(type: AccountType, signal?: AbortSignal): Promise<MunicipalAccount[]>;
  /** Active accounts that carry a budget */
  getBudgetAnalysis(signal?: AbortSignal): Promise<MunicipalAccount[]>;
}

/** Runs before every read; throw to simulate a failing store. */
export type ReadHook = (call: number) => Promise<void> | void;

export interface InMemoryRepositoryOptions {
  beforeRead?: ReadHook;
}

export interface InMemoryEnterpriseRepository extends EnterpriseRepository {
  /** Number of `getAll` calls so far */
  readonly reads: number;
}

export function inMemoryEnterpriseRepository(
  initial: readonly Enterprise[] = [],
  options: InMemoryRepositoryOptions = {}
): InMemoryEnterpriseRepository {
  const records = initial.map((enterprise) => ({ ...enterprise }));
  let nextId = records.reduce((max, e) => Math.max(max, e.id), 0) + 1;
  let reads = 0;

  return {
    get reads() {
      return reads;
    },

    async getAll() {
      reads++;
      await options.beforeRead?.(reads);
      return records.map((enterprise) => ({ ...enterprise }));
    },

    async add(draft) {
      const enterprise = { ...draft, id: nextId++ };
      records.push(enterprise);
      return { ...enterprise };
    },

    async update(enterprise) {
      const index = records.findIndex((e) => e.id === enterprise.id);
      if (index === -1) {
        throw new Error(`Enterprise ${enterprise.id} not found`);
      }
      records[index] = { ...enterprise };
      return { ...enterprise };
    },

    async delete(id) {
      const index = records.findIndex((enterprise) => enterprise.id === id);
      if (index === -1) return false;
      records.splice(index, 1);
      return true;
    },
  };
}

const byAccountNumber = (a: MunicipalAccount, b: MunicipalAccount) =>
  a.accountNumber.localeCompare(b.accountNumber, undefined, { numeric: true });

/** Every query returns active accounts ordered by account number. */
export function inMemoryMunicipalAccountRepository(
  initial: readonly MunicipalAccount[] = [],
  options: InMemoryRepositoryOptions = {}
): MunicipalAccountRepository {
  const records = initial.map((account) => ({ ...account }));
  let reads = 0;

  const read = async (filter: (account: MunicipalAccount) => boolean) => {
    reads++;
    await options.beforeRead?.(reads);
    return records
      .filter((account) => account.isActive && filter(account))
      .sort(byAccountNumber)
      .map((account) => ({ ...account }));
  };

  return {
    getActive: () => read(() => true),
    getByFund: (fund) => read((account) => account.fund === fund),
    getByType: (type) => read((account) => account.type === type),
    getBudgetAnalysis: () => read((account) => account.budgetAmount !== 0),
  };
}
