import cors from "cors";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import type { AppSettings } from "../config/settings.js";
import type { DocumentList, DocumentMetadata, DocumentRepository } from "../documents/types.js";
import type { GroundedQaEngine } from "../qa/qa-engine.js";
import { NotFoundError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { withTimeout } from "../shared/timeout.js";
import { errorHandler, notFoundHandler } from "./error-handler.js";
import { createRequestSchemas, parseBody } from "./validation.js";

const log = createLogger("http");

// Enough for the largest allowed document even when every character is multi-byte.
const JSON_BODY_LIMIT = "1mb";

export interface AppDependencies {
  repository: DocumentRepository;
  engine: Pick<GroundedQaEngine, "answer">;
  settings: AppSettings;
}

export interface HealthResponse {
  status: "healthy";
  version: string;
  documents_stored: number;
  timestamp: string;
}

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncRoute(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

function documentId(req: { params: Record<string, string | undefined> }): string {
  return req.params["id"] ?? "";
}

export function createApp(deps: AppDependencies): Express {
  const { repository, engine, settings } = deps;
  const schemas = createRequestSchemas(settings);
  const app = express();

  app.disable("x-powered-by");
  app.use(cors());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.get("/health", (_req, res) => {
    const body: HealthResponse = {
      status: "healthy",
      version: settings.appVersion,
      documents_stored: repository.count(),
      timestamp: new Date().toISOString(),
    };
    res.json(body);
  });

  app.post(
    "/documents",
    asyncRoute(async (req, res) => {
      const input = parseBody(schemas.createDocument, req.body);
      const doc = await repository.create(input, { maxDocuments: settings.maxDocuments });
      const body: DocumentMetadata = {
        id: doc.id,
        title: doc.title,
        word_count: doc.word_count,
        character_count: doc.character_count,
        created_at: doc.created_at,
      };
      res.status(201).json(body);
    }),
  );

  app.get("/documents", (_req, res) => {
    const documents = repository.list();
    const body: DocumentList = { documents, total_count: documents.length };
    res.json(body);
  });

  app.get("/documents/:id", (req, res) => {
    const id = documentId(req);
    const doc = repository.get(id);
    if (!doc) {
      throw new NotFoundError(
        "Document",
        id,
        `Document not found: ${id}. Use GET /documents to see available documents.`,
      );
    }
    res.json(doc);
  });

  app.delete(
    "/documents/:id",
    asyncRoute(async (req, res) => {
      const id = documentId(req);
      const deleted = await repository.delete(id);
      if (!deleted) {
        throw new NotFoundError("Document", id, `Document not found: ${id}`);
      }
      res.json({ message: `Document ${id} deleted successfully` });
    }),
  );

  app.post(
    "/documents/:id/ask",
    asyncRoute(async (req, res) => {
      const { question } = parseBody(schemas.askQuestion, req.body);
      const id = documentId(req);
      const doc = repository.get(id);
      if (!doc) {
        throw new NotFoundError(
          "Document",
          id,
          `Document not found: ${id}. Upload a document first using POST /documents.`,
        );
      }

      const answer = await withTimeout(
        engine.answer({ title: doc.title, content: doc.content, question }),
        settings.askTimeoutMs,
        "Question answering",
      );
      res.json(answer);
    }),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  log.debug("Routes registered", { maxDocuments: settings.maxDocuments });
  return app;
}
