/**
 * Domain records shown by the utility desk.
 */

export interface Enterprise {
  id: number;
  name: string;
  /** Service category, e.g. "Water", "Sewer" */
  type: string;
  /** Monthly rate charged per citizen */
  currentRate: number;
  citizenCount: number;
  monthlyExpenses: number;
  totalBudget: number;
  notes: string;
}

export type EnterpriseDraft = Omit<Enterprise, "id">;

export type AccountType = "Asset" | "Liability" | "Equity" | "Revenue" | "Expense";

export type FundType = "General" | "Water" | "Sewer" | "Trash" | "Enterprise";

export interface MunicipalAccount {
  id: number;
  accountNumber: string;
  name: string;
  type: AccountType;
  fund: FundType;
  balance: number;
  budgetAmount: number;
  isActive: boolean;
}

// =============================================================================
// Derived values
// =============================================================================

export function monthlyRevenue(enterprise: Enterprise): number {
  return enterprise.citizenCount * enterprise.currentRate;
}

export function monthlyBalance(enterprise: Enterprise): number {
  return monthlyRevenue(enterprise) - enterprise.monthlyExpenses;
}

export interface BudgetSummary {
  totalRevenue: number;
  totalExpenses: number;
  monthlyBalance: number;
  citizensServed: number;
  status: "Surplus" | "Deficit";
}

/** Totals across enterprises; `undefined` when there are none. */
export function budgetSummary(
  enterprises: readonly Enterprise[]
): BudgetSummary | undefined {
  if (enterprises.length === 0) return undefined;

  let totalRevenue = 0;
  let totalExpenses = 0;
  let citizensServed = 0;
  for (const enterprise of enterprises) {
    totalRevenue += monthlyRevenue(enterprise);
    totalExpenses += enterprise.monthlyExpenses;
    citizensServed += enterprise.citizenCount;
  }
  const balance = totalRevenue - totalExpenses;

  return {
    totalRevenue,
    totalExpenses,
    monthlyBalance: balance,
    citizensServed,
    status: balance >= 0 ? "Surplus" : "Deficit",
  };
}
