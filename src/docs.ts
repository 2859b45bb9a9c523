import path from "node:path";
import fs from "node:fs";

// src/ when run from sources, dist/src/ once built.
const SWAGGER_CANDIDATES = [
  path.resolve(__dirname, "..", "swagger.json"),
  path.resolve(__dirname, "..", "..", "swagger.json")
];

export function loadSwaggerDocument(candidates: string[] = SWAGGER_CANDIDATES): Record<string, unknown> | null {
  const swaggerPath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!swaggerPath) {
    console.warn(`Swagger definition not found (looked in ${candidates.join(", ")}). /docs route disabled.`);
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    console.error(`Swagger definition at ${swaggerPath} is not a JSON object`);
  } catch (error) {
    console.error("Failed to parse swagger.json", error);
  }
  return null;
}
