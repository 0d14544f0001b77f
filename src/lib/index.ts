/**
 * nginx-le-helper library - core exports
 *
 * Scanning, domain extraction, verification and issuance helpers used by the
 * CLI steps.
 */

export { resolveConfig, findExecutable } from './config.js';
export type { HelperConfig, HelperConfigOverrides } from './config.js';
export * from './constants/defaults.js';

// Errors
export {
  HelperError,
  NotFoundError,
  ValidationError,
  ConflictError,
  VerificationError,
  PreconditionError,
  IssuanceError,
  AbortError,
  isHelperError,
} from './errors/helper-errors.js';
export type { HelperErrorType, VerificationFailure } from './errors/helper-errors.js';

// nginx configuration
export {
  listConfigFiles,
  formatFileList,
  containsChallenge,
} from './nginx/scanner.js';
export type { ConfigFile, ScanOptions } from './nginx/scanner.js';
export {
  extractDomains,
  mergeDomains,
  parseServerNameLine,
  cleanHostname,
  uniqueSorted,
} from './nginx/domains.js';
export { challengeBlock, sslBlock } from './nginx/templates.js';

// Verification
export {
  verifyDomains,
  checkDomains,
  challengeCheckUrl,
  undiciHeadProbe,
} from './verify/domain-verifier.js';
export type { StatusProbe, VerifyOptions, DomainCheck } from './verify/domain-verifier.js';

// Issuance
export { buildIssuerArgs, joinArgs, shellQuote, OUTPUT_ARGS } from './issuer/arguments.js';
export type { IssuanceRequest } from './issuer/arguments.js';
export { renderRenewScript, writeRenewScript } from './issuer/renew-script.js';
export type {
  RenewScriptParams,
  WriteRenewScriptOptions,
  WrittenScript,
} from './issuer/renew-script.js';
export { runIssuance, SpawnIssuerRunner, SpawnError } from './issuer/runner.js';
export type { IssuerRunner, RunIssuanceOptions } from './issuer/runner.js';
export { assertCertificates, missingCertificates } from './report/certificates.js';

// Orchestration
export { Pipeline } from './pipeline.js';
export type { PipelineHooks, PipelineResult } from './pipeline.js';
export { InquirerPrompter, ScriptedPrompter } from './prompts/prompter.js';
export type { Prompter, PromptChoice, ScriptedAnswer } from './prompts/prompter.js';
