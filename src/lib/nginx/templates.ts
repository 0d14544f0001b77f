import { join } from 'path';
import { FULLCHAIN_FILENAME, KEY_FILENAME } from '../constants/defaults.js';

const SSL_CIPHERS = [
  'ECDHE-RSA-AES128-GCM-SHA256',
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'DHE-RSA-AES128-GCM-SHA256',
  'kEDH+AESGCM',
  'ECDHE-RSA-AES128-SHA256',
  'ECDHE-ECDSA-AES128-SHA256',
  'ECDHE-RSA-AES256-SHA384',
  'ECDHE-ECDSA-AES256-SHA384',
  '!aNULL',
  '!eNULL',
  '!EXPORT',
  '!DES',
  '!RC4',
  '!MD5',
  '!PSK',
].join(':');

/** Snippet for the port 80 server section serving the challenge webroot */
export function challengeBlock(challengeDir: string): string {
  return `
### add to server listening to port 80 section ###
    location '/.well-known/acme-challenge' {
        default_type "text/plain";
        root         ${challengeDir};
    }
`;
}

/** Snippet for the port 443 server section using the issued certificate */
export function sslBlock(certsDir: string): string {
  return `
### add to server listening to port 443 section ###
    ssl_certificate      ${join(certsDir, FULLCHAIN_FILENAME)};
    ssl_certificate_key  ${join(certsDir, KEY_FILENAME)};

    add_header Strict-Transport-Security max-age=15768000;
    ssl_session_timeout  5m;
    ssl_protocols     TLSv1.2 TLSv1.3;
    ssl_session_cache shared:SSL:10m;
    ssl_ciphers '${SSL_CIPHERS}';
    ssl_prefer_server_ciphers on;
`;
}
