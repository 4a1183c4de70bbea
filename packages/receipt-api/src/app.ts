import type { ErrorRequestHandler, Express } from "express";
import {
  BatchParseRequestSchema,
  BatchParseResponseSchema,
  CategoryListResponseSchema,
  CategoryUpdateRequestSchema,
  CreateCategoryRequestSchema,
  CustomCategorySchema,
  HealthResponseSchema,
  IngestFailureResponseSchema,
  IngestReceiptResponseSchema,
  ManualTransactionRequestSchema,
  ParsedTransactionSchema,
  RawReceiptRequestSchema,
  TransactionDetailsResponseSchema,
  TransactionListQuerySchema,
  TransactionListResponseSchema,
  TransactionSummaryQuerySchema,
  TransactionSummaryResponseSchema,
  type BatchParseResult,
  type HealthResponse,
} from "@receipt-ledger/receipt-contracts";
import {
  applyDirectionSign,
  DEFAULT_CATEGORY_RULES,
  inferCategory,
  roundAmount,
} from "@receipt-ledger/receipt-parser";
import express from "express";
import type { ApiConfig } from "./config/env.js";
import { mapWithConcurrency } from "./domain/concurrency.js";
import { transactionsToCsv } from "./domain/csv-export.js";
import { customCategoryRules, ingestReceipt, type IngestDependencies } from "./domain/receipt-ingest.js";
import { summarizeTransactions } from "./domain/transaction-report.js";
import { consoleLogger, describeError, type ApiLogger } from "./logger.js";
import { parsePathParam, parseRequest, sendError, sendNotFound } from "./routes/http-utils.js";
import { createRowSink, deliverRow, type RowSink } from "./sinks/row-sink.js";
import type { TransactionStore } from "./types/transaction-store.js";

type CreateAppParams = {
  config: ApiConfig;
  store: TransactionStore;
  rowSink?: RowSink;
  logger?: ApiLogger;
  now?: () => Date;
};

export function createApp(params: CreateAppParams): Express {
  const app = express();
  const logger = params.logger ?? consoleLogger;
  const rowSink = params.rowSink ?? createRowSink(params.config);
  const now = params.now ?? (() => new Date());
  const ingestDeps: IngestDependencies = {
    store: params.store,
    rowSink,
    logger,
    maxDocumentBytes: params.config.maxDocumentBytes,
  };

  // a batch carries up to 20 receipt texts
  app.use(express.json({ limit: "25mb" }));

  app.get("/health", (_req, res) => {
    const payload: HealthResponse = {
      ok: true,
      service: "receipt-ledger-api",
      now: now().toISOString(),
      rowSink: rowSink.mode,
    };
    HealthResponseSchema.parse(payload);
    res.json(payload);
  });

  app.post("/v1/receipts/parse", async (req, res) => {
    const body = parseRequest(RawReceiptRequestSchema, req, res);
    if (!body) {
      return;
    }

    const outcome = await ingestReceipt(body, ingestDeps);
    if (!outcome.ok) {
      if (outcome.error === "payload_too_large") {
        sendError(res, 413, outcome.error, outcome.message);
        return;
      }
      res.status(422).json(
        IngestFailureResponseSchema.parse({
          error: outcome.error,
          failure: outcome.failure,
          summary: outcome.summary,
        }),
      );
      return;
    }

    res.status(outcome.created ? 201 : 200).json(
      IngestReceiptResponseSchema.parse({
        record: outcome.record,
        created: outcome.created,
        confidence: outcome.confidence,
        rowSink: outcome.rowSink,
        summary: outcome.summary,
      }),
    );
  });

  app.post("/v1/receipts/batch/parse", async (req, res) => {
    const body = parseRequest(BatchParseRequestSchema, req, res);
    if (!body) {
      return;
    }

    const results = await mapWithConcurrency(
      body.receipts,
      params.config.batchConcurrency,
      async (receipt, index): Promise<BatchParseResult> => {
        const outcome = await ingestReceipt(receipt, ingestDeps);
        if (outcome.ok) {
          return {
            index,
            ok: true,
            record: outcome.record,
            created: outcome.created,
            rowSink: outcome.rowSink,
          };
        }
        if (outcome.error === "payload_too_large") {
          return { index, ok: false, error: outcome.error, message: outcome.message };
        }
        return {
          index,
          ok: false,
          error: outcome.error,
          failure: outcome.failure,
          message: outcome.failure.message,
        };
      },
    );

    const stored = results.filter((result) => result.ok).length;
    res.json(
      BatchParseResponseSchema.parse({
        requested: body.receipts.length,
        stored,
        failed: results.length - stored,
        results,
      }),
    );
  });

  app.get("/v1/transactions", (req, res) => {
    const query = parseRequest(TransactionListQuerySchema, req, res, "query");
    if (!query) {
      return;
    }
    res.json(TransactionListResponseSchema.parse({ transactions: params.store.list(query) }));
  });

  app.post("/v1/transactions", async (req, res) => {
    const body = parseRequest(ManualTransactionRequestSchema, req, res);
    if (!body) {
      return;
    }

    const magnitude = roundAmount(body.amount);
    if (magnitude === 0) {
      sendError(res, 400, "invalid_request", "amount rounds to zero");
      return;
    }

    const category =
      body.category ??
      inferCategory([body.description, body.merchant ?? ""].join(" ").trim(), [
        ...customCategoryRules(params.store),
        ...DEFAULT_CATEGORY_RULES,
      ]);
    const transaction = ParsedTransactionSchema.parse({
      transactionId: body.transactionId,
      occurredAt: body.occurredAt,
      description: body.description,
      amount: applyDirectionSign(magnitude, body.direction),
      direction: body.direction,
      category,
      merchant: body.merchant,
      rawText: body.rawText,
    });

    const { record, created } = params.store.upsert(transaction, "manual");
    await deliverRow({ sink: rowSink, transaction: record, recordKey: record.recordKey, logger });
    res.status(created ? 201 : 200).json(TransactionDetailsResponseSchema.parse({ transaction: record }));
  });

  app.get("/v1/transactions/export.csv", (_req, res) => {
    res
      .status(200)
      .type("text/csv")
      .attachment("transactions.csv")
      .send(transactionsToCsv(params.store.list()));
  });

  app.get("/v1/transactions/:recordKey", (req, res) => {
    const recordKey = parsePathParam(req, "recordKey", res);
    if (!recordKey) {
      return;
    }

    const transaction = params.store.get(recordKey);
    if (!transaction) {
      sendNotFound(res, `transaction not found: ${recordKey}`);
      return;
    }
    res.json(TransactionDetailsResponseSchema.parse({ transaction }));
  });

  app.patch("/v1/transactions/:recordKey/category", (req, res) => {
    const recordKey = parsePathParam(req, "recordKey", res);
    if (!recordKey) {
      return;
    }

    const body = parseRequest(CategoryUpdateRequestSchema, req, res);
    if (!body) {
      return;
    }

    const transaction = params.store.updateCategory(recordKey, body.category);
    if (!transaction) {
      sendNotFound(res, `transaction not found: ${recordKey}`);
      return;
    }
    res.json(TransactionDetailsResponseSchema.parse({ transaction }));
  });

  app.get("/v1/reports/summary", (req, res) => {
    const query = parseRequest(TransactionSummaryQuerySchema, req, res, "query");
    if (!query) {
      return;
    }

    const summary = summarizeTransactions({
      transactions: params.store.list(),
      period: query.period,
      asOf: now(),
    });
    res.json(TransactionSummaryResponseSchema.parse(summary));
  });

  app.get("/v1/categories", (_req, res) => {
    res.json(CategoryListResponseSchema.parse({ categories: params.store.listCategories() }));
  });

  app.post("/v1/categories", (req, res) => {
    const body = parseRequest(CreateCategoryRequestSchema, req, res);
    if (!body) {
      return;
    }

    const category = params.store.createCategory(body);
    if (!category) {
      sendError(res, 409, "conflict", `category already exists: ${body.name}`);
      return;
    }
    res.status(201).json(CustomCategorySchema.parse(category));
  });

  app.delete("/v1/categories/:name", (req, res) => {
    const name = parsePathParam(req, "name", res);
    if (!name) {
      return;
    }

    if (!params.store.deleteCategory(name)) {
      sendNotFound(res, `category not found: ${name}`);
      return;
    }
    res.status(204).end();
  });

  const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    const status = httpStatusOf(error);
    if (status === 413) {
      sendError(res, 413, "payload_too_large", describeError(error));
      return;
    }
    if (status === 400) {
      sendError(res, 400, "invalid_request", describeError(error));
      return;
    }

    logger.error(`unhandled error: ${describeError(error)}`);
    res.status(500).json({ error: "internal_error" });
  };
  app.use(handleError);

  return app;
}

// body-parser errors carry the status they map to
function httpStatusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : null;
  }
  return null;
}
