import { describe, it, expect } from "vitest";
import { budgetSummary, monthlyBalance, monthlyRevenue } from "./types";
import { enterpriseRecords } from "./test/fixtures";

describe("enterprise figures", () => {
  it("should derive revenue and balance from rate and citizens", () => {
    const [water] = enterpriseRecords;

    expect(monthlyRevenue(water)).toBe(2000);
    expect(monthlyBalance(water)).toBe(500);
  });

  it("should total a budget summary", () => {
    expect(budgetSummary(enterpriseRecords)).toEqual({
      totalRevenue: 5700,
      totalExpenses: 5500,
      monthlyBalance: 200,
      citizensServed: 290,
      status: "Surplus",
    });
  });

  it("should report a deficit and nothing for an empty list", () => {
    const [, sewer] = enterpriseRecords;

    expect(budgetSummary([sewer])?.status).toBe("Deficit");
    expect(budgetSummary([])).toBeUndefined();
  });
});
