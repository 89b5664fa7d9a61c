import type { Enterprise, MunicipalAccount } from "../types";

export const enterpriseRecords: readonly Enterprise[] = [
  {
    id: 1,
    name: "North Water",
    type: "Water",
    currentRate: 20,
    citizenCount: 100,
    monthlyExpenses: 1500,
    totalBudget: 18000,
    notes: "",
  },
  {
    id: 2,
    name: "East Sewer",
    type: "Sewer",
    currentRate: 30,
    citizenCount: 100,
    monthlyExpenses: 3500,
    totalBudget: 42000,
    notes: "",
  },
  {
    id: 3,
    name: "Town Trash",
    type: "Trash",
    currentRate: 10,
    citizenCount: 50,
    monthlyExpenses: 400,
    totalBudget: 4800,
    notes: "",
  },
  {
    id: 4,
    name: "Parks",
    type: "Recreation",
    currentRate: 5,
    citizenCount: 40,
    monthlyExpenses: 100,
    totalBudget: 1200,
    notes: "",
  },
];

const funds = ["General", "Water", "Sewer"] as const;

/** `count` accounts cycling through three funds; every fifth is inactive. */
export function accountRecords(count: number): MunicipalAccount[] {
  return Array.from({ length: count }, (_, index): MunicipalAccount => ({
    id: index + 1,
    accountNumber: `${100 + index}`,
    name: `Account ${index + 1}`,
    type: "Asset",
    fund: funds[index % funds.length],
    balance: 1000,
    budgetAmount: 1200,
    isActive: index % 5 !== 4,
  }));
}
