import type { Decimal } from "decimal.js";
import { CategoryRepo, ExpenseRepo, SettledTransferRepo, TripRepo, type AppDatabase } from "../storage/index.js";
import { TripService } from "./TripService.js";
import { CategoryService } from "./CategoryService.js";
import { ExpenseService } from "./ExpenseService.js";
import { SettlementService } from "./SettlementService.js";
import type { TransferStrategyName } from "../types/index.js";

export { TripService } from "./TripService.js";
export { CategoryService } from "./CategoryService.js";
export { ExpenseService } from "./ExpenseService.js";
export type { NewExpense, NewExpenseSplit, ItemizedPreview } from "./ExpenseService.js";
export { SettlementService } from "./SettlementService.js";
export type { TripSettlement } from "./SettlementService.js";

export interface AppServices {
  trips: TripService;
  categories: CategoryService;
  expenses: ExpenseService;
  settlements: SettlementService;
}

// Wire repositories and services over one database
export function createServices(
  db: AppDatabase,
  options: { extremePercentThreshold?: Decimal; defaultStrategy?: TransferStrategyName } = {}
): AppServices {
  const tripRepo = new TripRepo(db);
  const categoryRepo = new CategoryRepo(db);
  const expenseRepo = new ExpenseRepo(db);
  const settledTransferRepo = new SettledTransferRepo(db);

  return {
    trips: new TripService(tripRepo),
    categories: new CategoryService(categoryRepo),
    expenses: new ExpenseService(expenseRepo, tripRepo, categoryRepo, {
      extremePercentThreshold: options.extremePercentThreshold,
    }),
    settlements: new SettlementService(tripRepo, expenseRepo, categoryRepo, settledTransferRepo, {
      defaultStrategy: options.defaultStrategy,
    }),
  };
}
