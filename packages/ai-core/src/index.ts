/**
 * @advisor-chain/ai-core
 *
 * Advisor pipeline around a chat model:
 * - Chat model port with a Vercel AI SDK implementation
 * - Advised request snapshots and the per-invocation advisor context
 * - Chain executor for the request, response and stream legs
 * - Memory, retrieval and logging advisors
 * - Fluent chat client facade
 */

// ============================================================================
// Advisors
// ============================================================================
export * from "./advisors";
// ============================================================================
// Chat Client
// ============================================================================
export * from "./client";
// ============================================================================
// Errors
// ============================================================================
export * from "./errors";
// ============================================================================
// Logging
// ============================================================================
export * from "./logging";
// ============================================================================
// Providers
// ============================================================================
export * from "./providers";
