/**
 * @resumekit/schemas - Structured resume record and its vocabularies
 */

export * from './enums.js';
export * from './resume.js';
