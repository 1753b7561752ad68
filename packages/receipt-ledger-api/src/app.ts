import {
  createConsoleLogger,
  CreateReceiptResponseSchema,
  HealthResponseSchema,
  IncompleteExtractionResponseSchema,
  IngestReceiptResponseSchema,
  InsightsResponseSchema,
  ParseReceiptRequestSchema,
  ParseReceiptResponseSchema,
  ReceiptDetailsResponseSchema,
  ReceiptListResponseSchema,
  SaveReceiptRequestSchema,
  StatisticsQuerySchema,
  StatisticsResponseSchema,
  TaxonomyDefinitionSchema,
  TrendsQuerySchema,
  TrendsResponseSchema,
  UpdateReceiptResponseSchema,
  type HealthResponse,
  type LedgerLogger,
  type Taxonomy,
} from "@receipt-ledger/contracts";
import { TextResponseParser } from "@receipt-ledger/extractor";
import express from "express";
import type { Express } from "express";
import type { ApiConfig } from "./config/env.js";
import { AggregationEngine } from "./domain/aggregation-engine.js";
import { ReceiptIngestionService } from "./domain/receipt-ingestion.js";
import { parseBody, parseIdParam, parseQuery, sendLedgerError } from "./routes/http-utils.js";
import type { ReceiptStore } from "./types/receipt-store.js";

type CreateAppParams = {
  config: ApiConfig;
  store: ReceiptStore;
  taxonomy: Taxonomy;
  logger?: LedgerLogger;
};

export function createApp(params: CreateAppParams): Express {
  const logger = params.logger ?? createConsoleLogger("receipt-ledger-api");
  const parser = new TextResponseParser({ taxonomy: params.taxonomy, logger });
  const ingestion = new ReceiptIngestionService({ parser, store: params.store, logger });
  const aggregation = new AggregationEngine(params.store);

  const app = express();
  app.use(express.json({ limit: params.config.jsonLimit }));

  app.get("/health", (_req, res) => {
    const payload: HealthResponse = {
      ok: true,
      service: "receipt-ledger-api",
      now: new Date().toISOString(),
    };
    HealthResponseSchema.parse(payload);
    res.json(payload);
  });

  app.get("/v1/taxonomy", (_req, res) => {
    res.json(TaxonomyDefinitionSchema.parse(params.taxonomy.toDefinition()));
  });

  app.post("/v1/receipts/parse", (req, res) => {
    const body = parseBody(ParseReceiptRequestSchema, req, res);
    if (!body) {
      return;
    }

    const result = parser.parse(body);
    if (!result.ok) {
      res.status(422).json(
        IncompleteExtractionResponseSchema.parse({
          error: "incomplete_extraction",
          missing: result.missing,
        }),
      );
      return;
    }

    res.json(ParseReceiptResponseSchema.parse({ receipt: result.receipt }));
  });

  app.post("/v1/receipts/ingest", (req, res) => {
    const body = parseBody(ParseReceiptRequestSchema, req, res);
    if (!body) {
      return;
    }

    try {
      const ingested = ingestion.ingest(body);
      res.status(201).json(IngestReceiptResponseSchema.parse(ingested));
    } catch (error) {
      sendLedgerError(res, error, logger);
    }
  });

  app.get("/v1/receipts", (_req, res) => {
    res.json(ReceiptListResponseSchema.parse({ receipts: params.store.listReceipts() }));
  });

  app.post("/v1/receipts", (req, res) => {
    const body = parseBody(SaveReceiptRequestSchema, req, res);
    if (!body) {
      return;
    }

    try {
      const receiptId = params.store.add(body);
      res.status(201).json(CreateReceiptResponseSchema.parse({ receiptId }));
    } catch (error) {
      sendLedgerError(res, error, logger);
    }
  });

  app.get("/v1/receipts/:receiptId", (req, res) => {
    const receiptId = parseIdParam(req.params.receiptId, "receiptId", res);
    if (receiptId === null) {
      return;
    }

    const receipt = params.store.getReceipt(receiptId);
    if (!receipt) {
      res.status(404).json({ error: "not_found", message: `receipt not found: ${receiptId}` });
      return;
    }

    res.json(ReceiptDetailsResponseSchema.parse({ receipt }));
  });

  app.put("/v1/receipts/:receiptId", (req, res) => {
    const receiptId = parseIdParam(req.params.receiptId, "receiptId", res);
    if (receiptId === null) {
      return;
    }

    const body = parseBody(SaveReceiptRequestSchema, req, res);
    if (!body) {
      return;
    }

    try {
      const outcome = params.store.update(receiptId, body);
      res.json(UpdateReceiptResponseSchema.parse(outcome));
    } catch (error) {
      sendLedgerError(res, error, logger);
    }
  });

  app.get("/v1/stats", (req, res) => {
    const query = parseQuery(StatisticsQuerySchema, req, res);
    if (!query) {
      return;
    }
    res.json(StatisticsResponseSchema.parse(aggregation.statistics(query.period)));
  });

  app.get("/v1/trends", (req, res) => {
    const query = parseQuery(TrendsQuerySchema, req, res);
    if (!query) {
      return;
    }
    res.json(TrendsResponseSchema.parse(aggregation.trends(query)));
  });

  app.get("/v1/insights", (_req, res) => {
    res.json(InsightsResponseSchema.parse(aggregation.insights()));
  });

  return app;
}
