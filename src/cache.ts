/**
 * Transformers cache configuration.
 *
 * Kept apart from embeddings.ts so startup can point the model cache at the
 * right directory before any pipeline is created.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@xenova/transformers";

/**
 * Configure the @xenova/transformers cache directory for Node.js execution.
 *
 * @param cacheDir Optional explicit directory. Falls back to a project-local
 *                 .cache/transformers folder.
 * @returns Resolved cache directory actually used.
 */
export async function configureTransformersCache(cacheDir?: string): Promise<string> {
  const dir = cacheDir?.trim() || path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false; // filesystem cache in Node
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[RAG] Using TRANSFORMERS cache at: ${env.cacheDir}`);
  return dir;
}
