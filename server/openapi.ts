/**
 * OpenAPI 3.0 description of the read-only country endpoints,
 * served at /api-docs/openapi.json.
 */

type SchemaObject = Record<string, unknown>;

interface OperationObject {
  summary: string;
  operationId: string;
  tags: string[];
  parameters?: SchemaObject[];
  responses: Record<string, SchemaObject>;
}

export type OpenApiDocument = {
  openapi: "3.0.3";
  info: {
    title: string;
    version: string;
    description: string;
    license: { name: string; url: string };
  };
  tags: { name: string; description: string }[];
  paths: Record<string, { get: OperationObject }>;
  components: { schemas: Record<string, SchemaObject> };
};

const TAG = "World Countries API";

const jsonBody = (schema: SchemaObject, description: string): SchemaObject => ({
  description,
  content: { "application/json": { schema } },
});

const countryRef = { $ref: "#/components/schemas/Country" };
const errorRef = { $ref: "#/components/schemas/Error" };

const serverError = jsonBody(errorRef, "Internal server error");

const pathParam = (name: string, description: string): SchemaObject => ({
  name,
  in: "path",
  required: true,
  description,
  schema: { type: "string" },
});

export function buildOpenApiDocument(version: string): OpenApiDocument {
  return {
    openapi: "3.0.3",
    info: {
      title: "World Countries API",
      version,
      description: "REST API providing information about countries around the world",
      license: { name: "MIT", url: "https://opensource.org/licenses/MIT" },
    },
    tags: [{ name: TAG, description: "API for accessing country information" }],
    paths: {
      "/countries": {
        get: {
          summary: "List all countries",
          operationId: "allCountries",
          tags: [TAG],
          responses: {
            "200": jsonBody({ type: "array", items: countryRef }, "List of all countries"),
            "500": serverError,
          },
        },
      },
      "/countries/{code}": {
        get: {
          summary: "Get a country by its ISO 3166-1 alpha-2 code",
          operationId: "countryByCode",
          tags: [TAG],
          parameters: [pathParam("code", "ISO 3166-1 alpha-2 country code, matched case-insensitively")],
          responses: {
            "200": jsonBody(countryRef, "Country found"),
            "404": jsonBody(errorRef, "Country not found"),
            "500": serverError,
          },
        },
      },
      "/regions": {
        get: {
          summary: "List all geographical regions",
          operationId: "getRegions",
          tags: [TAG],
          responses: {
            "200": jsonBody({ type: "array", items: { type: "string" } }, "List of all geographical regions"),
            "500": serverError,
          },
        },
      },
      "/countries/region/{region}": {
        get: {
          summary: "List the countries in a region",
          operationId: "countriesByRegion",
          tags: [TAG],
          parameters: [pathParam("region", "Geographical region name, matched exactly")],
          responses: {
            "200": jsonBody(
              { type: "array", items: countryRef },
              "Countries in the region; empty when the region is unknown",
            ),
            "500": serverError,
          },
        },
      },
    },
    components: {
      schemas: {
        Country: {
          type: "object",
          required: ["code", "name", "region", "capital", "currency"],
          properties: {
            code: { type: "string", pattern: "^[A-Z]{2}$", example: "US" },
            name: { type: "string", example: "United States" },
            region: { type: "string", example: "North America" },
            capital: { type: "string", example: "Washington, D.C." },
            currency: { type: "string", pattern: "^[A-Z]{3}$", example: "USD" },
          },
          additionalProperties: true,
        },
        Error: {
          type: "object",
          required: ["error"],
          properties: { error: { type: "string" } },
        },
      },
    },
  };
}
