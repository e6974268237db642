/**
 * Quiet structured logs during test runs unless LOG_LEVEL asks for them.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
