/**
 * Profile agents.
 *
 * - ResumeExtractionAgent: structured resume record from PDF/TXT
 */

export * from './resume-parser/index.js';
