import { Errors } from '../shared/errors.js';

/**
 * Parsed connection target. Credentials are percent-decoded.
 */
export interface BackendConfig {
  readonly url: string;
  readonly scheme: string;
  readonly username: string;
  readonly password: string;
  /** host[:port] as written */
  readonly host: string;
  readonly hostname: string;
  readonly port?: number;
  readonly database: string;
}

const SCHEME = /^[a-z][a-z\d+.-]*:/i;
const PATH_REFERENCE = /^\.{0,2}\//;

/**
 * Parse `scheme://[user[:password]@]host[:port]/database`.
 *
 * Throws CONFIG_PARSE_ERROR when the string is not a URL at all and
 * CONFIG_NOT_ABSOLUTE when it is a relative reference or has no host.
 */
export function parseBackendConfig(config: string): BackendConfig {
  const raw = config.trim();

  if (!SCHEME.test(raw)) {
    if (PATH_REFERENCE.test(raw)) {
      throw Errors.configNotAbsolute(config);
    }
    throw Errors.configParse(config, new TypeError('missing scheme'));
  }

  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw Errors.configParse(config, error);
  }

  if (url.host === '') {
    throw Errors.configNotAbsolute(config);
  }

  let username: string;
  let password: string;
  try {
    username = decodeURIComponent(url.username);
    password = decodeURIComponent(url.password);
  } catch (error) {
    throw Errors.configParse(config, error);
  }

  return Object.freeze({
    url: raw,
    scheme: url.protocol.replace(/:$/, ''),
    username,
    password,
    host: url.host,
    hostname: url.hostname,
    ...(url.port ? { port: Number(url.port) } : {}),
    database: url.pathname.replace(/^\/+/, ''),
  });
}

/**
 * `scheme://user@host/database`, never showing the password
 */
export function describeTarget(target: BackendConfig): string {
  return `${target.scheme}://${target.username}@${target.host}/${target.database}`;
}
