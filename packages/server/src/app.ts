import { existsSync, readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import cors from "cors";
import { RegisterRoutes } from "../build/routes.js";
import { errorHandler } from "./middleware/error-handler.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function createApp(): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Serve OpenAPI spec (written by `tsoa spec-and-routes`)
  app.get("/api-docs", (_req, res) => {
    const specPath = resolve(__dirname, "..", "build", "swagger.json");
    if (!existsSync(specPath)) {
      res.status(404).json({ message: "OpenAPI spec not generated; run `npm run spec`" });
      return;
    }
    const spec: unknown = JSON.parse(readFileSync(specPath, "utf-8"));
    res.json(spec);
  });

  RegisterRoutes(app);

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}

export { loadConfig, type ServerConfig } from "./config.js";
export {
  SpotRegistryService,
  SpotNotFoundError,
  UnclassifiableSpotError,
  getSpotRegistry,
  setSpotRegistry,
} from "./services/spot-registry.service.js";
export { ImportService, getImportService, setImportService } from "./services/import.service.js";
