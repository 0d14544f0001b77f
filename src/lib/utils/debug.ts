/**
 * Debug logging for nginx-le-helper
 *
 * Namespaced on top of the `debug` package, enable with the DEBUG environment variable:
 *
 * DEBUG=nginx-le:* - All debug output
 * DEBUG=nginx-le:scan - Only configuration scanning
 * DEBUG=nginx-le:verify - Only reachability checks
 * DEBUG=nginx-le:issuer - Only issuance tool invocation
 */

import debug from 'debug';

const root = debug('nginx-le');

export const debugScan = root.extend('scan');
export const debugDomains = root.extend('domains');
export const debugVerify = root.extend('verify');
export const debugIssuer = root.extend('issuer');
export const debugPipeline = root.extend('pipeline');
export const debugMain = root.extend('main');
