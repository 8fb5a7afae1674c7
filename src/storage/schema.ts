import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";

// Money columns hold exact decimal strings, never floats

export const trips = sqliteTable("trips", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  baseCurrency: text("base_currency").notNull(),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
});

export const tripMembers = sqliteTable("trip_members", {
  id: text("id").primaryKey(),
  tripId: text("trip_id").notNull().references(() => trips.id, { onDelete: "cascade" }),
  userId: text("user_id").notNull(),
  displayName: text("display_name").notNull(),
  position: integer("position").notNull(),
  joinedAt: integer("joined_at", { mode: "timestamp" }).notNull(),
});

export const categories = sqliteTable("categories", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  color: text("color"),
  icon: text("icon"),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
});

export const expenses = sqliteTable("expenses", {
  id: text("id").primaryKey(),
  tripId: text("trip_id").notNull().references(() => trips.id, { onDelete: "cascade" }),
  description: text("description").notNull(),
  amount: text("amount").notNull(),
  currency: text("currency").notNull(),
  payerUserId: text("payer_user_id").notNull(),
  splitType: text("split_type", { enum: ["equal", "weighted", "itemized"] }).notNull(),
  categoryId: text("category_id").references(() => categories.id, { onDelete: "set null" }),
  receipt: text("receipt"), // itemized receipt as JSON
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

export const expenseParticipants = sqliteTable("expense_participants", {
  id: text("id").primaryKey(),
  expenseId: text("expense_id").notNull().references(() => expenses.id, { onDelete: "cascade" }),
  userId: text("user_id").notNull(),
  position: integer("position").notNull(),
  value: text("value"), // weight for weighted, amount for itemized, null for equal
});

export const settledTransfers = sqliteTable("settled_transfers", {
  id: text("id").primaryKey(),
  tripId: text("trip_id").notNull().references(() => trips.id, { onDelete: "cascade" }),
  transferId: text("transfer_id").notNull(),
  fromUserId: text("from_user_id").notNull(),
  toUserId: text("to_user_id").notNull(),
  amount: text("amount").notNull(),
  currency: text("currency").notNull(),
  settledAt: integer("settled_at", { mode: "timestamp_ms" }).notNull(),
});
