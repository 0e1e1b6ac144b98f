import type { Express } from "express";
import * as swaggerUi from "swagger-ui-express";
import { type IStorage, normalizeCode } from "./storage";
import { buildOpenApiDocument } from "./openapi";

export interface RouteOptions {
  apiVersion: string;
}

export function registerRoutes(app: Express, storage: IStorage, options: RouteOptions) {
  const openApiDocument = buildOpenApiDocument(options.apiVersion);

  // All countries, in dataset order
  app.get("/countries", async (_req, res) => {
    try {
      const countries = await storage.getAll();
      res.json(countries);
    } catch (error) {
      console.error("Error fetching countries:", error);
      res.status(500).json({ error: "Failed to fetch countries" });
    }
  });

  // Registered before /countries/:code so "region" is not read as a code
  app.get("/countries/region/:region", async (req, res) => {
    try {
      const { region } = req.params;
      const countries = await storage.getByRegion(region);
      res.json(countries);
    } catch (error) {
      console.error("Error fetching countries by region:", error);
      res.status(500).json({ error: "Failed to fetch countries by region" });
    }
  });

  app.get("/countries/:code", async (req, res) => {
    try {
      const { code } = req.params;
      const country = await storage.getByCode(code);

      if (!country) {
        res.status(404).json({ error: `Country with code ${normalizeCode(code)} not found` });
        return;
      }

      res.json(country);
    } catch (error) {
      console.error("Error fetching country by code:", error);
      res.status(500).json({ error: "Failed to fetch country" });
    }
  });

  app.get("/regions", async (_req, res) => {
    try {
      const regions = await storage.getRegions();
      res.json(regions);
    } catch (error) {
      console.error("Error fetching regions:", error);
      res.status(500).json({ error: "Failed to fetch regions" });
    }
  });

  app.get("/api-docs/openapi.json", (_req, res) => {
    res.json(openApiDocument);
  });

  app.use("/swagger-ui", swaggerUi.serve, swaggerUi.setup(openApiDocument));
}
