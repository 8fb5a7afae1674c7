import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import type { AppServices } from "../services/index.js";
import {
  ExpenseValidationError,
  NotFoundError,
  RequestValidationError,
  SettlementComputationError,
} from "../errors.js";
import {
  breakdownQuerySchema,
  createCategorySchema,
  createExpenseSchema,
  createTripSchema,
  itemizedPreviewSchema,
  memberSchema,
  parseRequest,
  settlementQuerySchema,
  settleTransferSchema,
} from "./schemas.js";
import {
  serializeExpense,
  serializeItemizedResult,
  serializeSettledTransfer,
  serializeSettlement,
  serializeTransferBreakdown,
} from "./serialize.js";

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
const handle =
  (fn: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(express.json());

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok", message: "Trip ledger API" });
  });

  // Trips
  app.post(
    "/trips",
    handle(async (req, res) => {
      const body = parseRequest(createTripSchema, req.body);
      const trip = await services.trips.createTrip(body);
      res.status(201).json(trip);
    })
  );

  app.get(
    "/trips/:tripId",
    handle(async (req, res) => {
      res.json(await services.trips.getTrip(req.params.tripId));
    })
  );

  app.post(
    "/trips/:tripId/members",
    handle(async (req, res) => {
      const member = parseRequest(memberSchema, req.body);
      res.status(201).json(await services.trips.addMember(req.params.tripId, member));
    })
  );

  // Expenses
  app.post(
    "/trips/:tripId/expenses",
    handle(async (req, res) => {
      const body = parseRequest(createExpenseSchema, req.body);
      const { expense, warnings } = await services.expenses.createExpense(req.params.tripId, body);
      res.status(201).json({ expense: serializeExpense(expense), warnings });
    })
  );

  app.get(
    "/trips/:tripId/expenses",
    handle(async (req, res) => {
      await services.trips.getTrip(req.params.tripId);
      const expenses = await services.expenses.getTripExpenses(req.params.tripId);
      res.json(expenses.map(serializeExpense));
    })
  );

  app.delete(
    "/trips/:tripId/expenses/:expenseId",
    handle(async (req, res) => {
      await services.expenses.deleteExpense(req.params.tripId, req.params.expenseId);
      res.status(204).end();
    })
  );

  app.post(
    "/itemized/preview",
    handle(async (req, res) => {
      const body = parseRequest(itemizedPreviewSchema, req.body);
      const result = services.expenses.previewItemized(body);
      res.status(result.ok ? 200 : 422).json(serializeItemizedResult(result));
    })
  );

  // Settlement
  app.get(
    "/trips/:tripId/settlement",
    handle(async (req, res) => {
      const { strategy } = parseRequest(settlementQuerySchema, req.query);
      const settlement = await services.settlements.getSettlement(req.params.tripId, { strategy });
      res.json(serializeSettlement(settlement));
    })
  );

  app.get(
    "/trips/:tripId/transfers/breakdown",
    handle(async (req, res) => {
      const { from, to } = parseRequest(breakdownQuerySchema, req.query);
      const breakdown = await services.settlements.explainTransfer(req.params.tripId, from, to);
      res.json(serializeTransferBreakdown(breakdown));
    })
  );

  app.post(
    "/trips/:tripId/settled-transfers",
    handle(async (req, res) => {
      const body = parseRequest(settleTransferSchema, req.body);
      const settled = await services.settlements.markTransferSettled(req.params.tripId, body);
      res.status(201).json(serializeSettledTransfer(settled));
    })
  );

  app.delete(
    "/trips/:tripId/settled-transfers/:transferId",
    handle(async (req, res) => {
      await services.settlements.unmarkTransferSettled(req.params.tripId, req.params.transferId);
      res.status(204).end();
    })
  );

  // Categories
  app.post(
    "/categories",
    handle(async (req, res) => {
      const body = parseRequest(createCategorySchema, req.body);
      res.status(201).json(await services.categories.createCategory(body));
    })
  );

  app.get(
    "/categories",
    handle(async (req, res) => {
      res.json(await services.categories.listCategories());
    })
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: "Not Found",
      message: `No route for ${req.method} ${req.path}`,
    });
  });

  app.use(errorHandler);

  return app;
}

export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof RequestValidationError) {
    res.status(400).json({ error: "Bad Request", message: error.message, details: error.details });
  } else if (error instanceof NotFoundError) {
    res.status(404).json({ error: "Not Found", message: error.message });
  } else if (error instanceof ExpenseValidationError) {
    res.status(422).json({
      error: "Unprocessable Entity",
      message: error.message,
      issues: error.issues,
      warnings: error.warnings,
    });
  } else if (error instanceof SettlementComputationError) {
    console.error("Settlement computation failed:", error.issue);
    res.status(500).json({ error: "Internal Server Error", message: error.message, issue: error.issue });
  } else if (error instanceof SyntaxError) {
    // Malformed JSON body
    res.status(400).json({ error: "Bad Request", message: error.message });
  } else if (error instanceof ZodError) {
    console.error("Stored data failed to parse:", error.issues);
    res.status(500).json({ error: "Internal Server Error", message: "Stored data is malformed" });
  } else {
    console.error("Unhandled error:", error);
    res.status(500).json({ error: "Internal Server Error", message: "Something went wrong" });
  }
}
