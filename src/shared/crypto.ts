/**
 * Shared cryptographic utilities
 */
import { randomBytes } from "node:crypto";

/**
 * Generate a unique correlation/request ID for tracing requests across logs
 */
export function generateCorrelationId(): string {
  return randomBytes(8).toString("hex");
}
