/**
 * Jest Global Setup
 *
 * Runs before every test file. `reflect-metadata` must be loaded before any
 * tsyringe-decorated class is imported. Logging is silenced unless a run asks
 * for it explicitly; config.ts reads LOG_LEVEL when it is first imported.
 */
import 'reflect-metadata';

process.env.LOG_LEVEL ??= 'silent';
