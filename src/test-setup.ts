/**
 * Test Setup - loaded before all test files (vitest setupFiles)
 *
 * Placeholder environment so nothing under test reaches a real service.
 */

process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "silent";

process.env.GOOGLE_API_KEY = process.env.GOOGLE_API_KEY || "test-secret";
process.env.OPENAI_API_KEY = process.env.OPENAI_API_KEY || "test-secret";
process.env.ANTHROPIC_API_KEY = process.env.ANTHROPIC_API_KEY || "test-secret";
