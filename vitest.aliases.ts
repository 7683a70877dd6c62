/**
 * Vitest alias configuration for workspace packages.
 *
 * Aliases are ordered so that subpaths are matched before their parent packages.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  // Subpath exports (must come before parent packages)
  {
    find: "@advisor-chain/ai-core/testing",
    replacement: path.resolve(rootDir, "packages/ai-core/src/testing/index.ts"),
  },

  // Main packages
  {
    find: "@advisor-chain/ai-core",
    replacement: path.resolve(rootDir, "packages/ai-core/src/index.ts"),
  },
  {
    find: "@advisor-chain/memory",
    replacement: path.resolve(rootDir, "packages/memory/src/index.ts"),
  },
];
