import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { DocumentService } from "../documents/document.service";
import { sendError } from "./error-response";
import { parseDocumentRequest } from "./request.parsers";

interface DocumentsControllerDeps {
  documentService: DocumentService;
  logger: Logger;
}

export function buildDocumentsController(deps: DocumentsControllerDeps): Router {
  const router = Router();

  router.get("/", async (request: Request, response: Response) => {
    try {
      const { id, docType } = parseDocumentRequest(request.query);
      const document = await deps.documentService.getDocument(id, docType);
      response.status(200).json(document);
    } catch (error) {
      sendError(response, error, deps.logger, "GET /document");
    }
  });

  return router;
}
