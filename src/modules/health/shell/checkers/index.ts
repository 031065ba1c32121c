export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
