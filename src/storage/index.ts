export { createDatabase, type AppDatabase } from "./db.js";
export * from "./schema.js";
export * from "./codec.js";
export { TripRepo } from "./repos/TripRepo.js";
export { CategoryRepo } from "./repos/CategoryRepo.js";
export { ExpenseRepo } from "./repos/ExpenseRepo.js";
export { SettledTransferRepo } from "./repos/SettledTransferRepo.js";
