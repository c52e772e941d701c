// Input checks shared by the synchronous and asynchronous controllers.

import type { Authentication } from "@pack-catalog/shared";
import { ValidationError } from "./errors.js";
import type { NewServerRecord } from "./store.js";

export const CHANNEL_PATTERN = /^[#&][A-Za-z_-]{1,32}$/;

/** Used for bot names and for the nickname a server connection identifies with. */
export const NICKNAME_PATTERN = /^[A-Za-z_|-]{1,32}$/;

/** Substring searches are run as `%term%`, so a raw `%` would widen the match. */
export const SEARCH_WILDCARD = "%";

const AUTHENTICATION_REQUIRES_PASSWORD: Record<Authentication, boolean> = {
  none: false,
  nickserv: true
};

const isBlank = (value: unknown): boolean => {
  return typeof value !== "string" || value.trim().length === 0;
};

export const isAuthentication = (value: unknown): value is Authentication => {
  return value === "none" || value === "nickserv";
};

export const requiresPassword = (auth: Authentication): boolean => {
  return AUTHENTICATION_REQUIRES_PASSWORD[auth];
};

/** Returns the host trimmed and lower-cased. */
export function checkHost(host: string): string {
  if (isBlank(host)) {
    throw new ValidationError(`Host must not be empty: "${String(host)}"`);
  }

  return host.trim().toLowerCase();
}

export function checkChannelName(name: string): void {
  if (isBlank(name)) {
    throw new ValidationError(`Channel name must not be empty: "${String(name)}"`);
  }

  if (!CHANNEL_PATTERN.test(name)) {
    throw new ValidationError(`Channel name must match ${CHANNEL_PATTERN.source} but "${name}" was given`);
  }
}

export function checkNickname(name: string): void {
  if (isBlank(name)) {
    throw new ValidationError(`Nickname must not be empty: "${String(name)}"`);
  }

  if (!NICKNAME_PATTERN.test(name)) {
    throw new ValidationError(`Nickname must match ${NICKNAME_PATTERN.source} but "${name}" was given`);
  }
}

export function checkFileName(name: string): void {
  if (isBlank(name)) {
    throw new ValidationError(`File name must not be empty: "${String(name)}"`);
  }
}

export function checkSearchTerm(term: string): void {
  if (isBlank(term)) {
    throw new ValidationError(`Search term must not be empty: "${String(term)}"`);
  }

  if (term.includes(SEARCH_WILDCARD)) {
    throw new ValidationError(`Search term must not contain '${SEARCH_WILDCARD}': "${term}"`);
  }
}

export function checkAuthentication(auth: Authentication, userPassword: string | null | undefined): void {
  if (!isAuthentication(auth)) {
    throw new ValidationError(`Unknown authentication mode: "${String(auth)}"`);
  }

  if (requiresPassword(auth) && (typeof userPassword !== "string" || userPassword.length === 0)) {
    throw new ValidationError(`Authentication mode "${auth}" requires a user password`);
  }
}

export function checkPort(port: number): void {
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new ValidationError(`Port must be an integer between 1 and 65535: ${String(port)}`);
  }
}

/** Pack numbers are 32-bit signed integers. */
export const PACK_NUMBER_MIN = -(2 ** 31);
export const PACK_NUMBER_MAX = 2 ** 31 - 1;

export function checkPackNumber(number: number): void {
  if (!Number.isInteger(number) || number < PACK_NUMBER_MIN || number > PACK_NUMBER_MAX) {
    throw new ValidationError(
      `Pack number must be an integer between ${PACK_NUMBER_MIN} and ${PACK_NUMBER_MAX}: ${String(number)}`
    );
  }
}

export interface ServerIdentity {
  nickName: string;
  /** Defaults to the nickname. */
  userName?: string | null;
  /** Defaults to the nickname. */
  realName?: string | null;
  authentication: Authentication;
  userPassword?: string | null;
}

export interface ServerSpec extends ServerIdentity {
  host: string;
  port: number;
  password?: string | null;
}

export interface NormalizedIdentity {
  nickName: string;
  userName: string;
  realName: string;
  authentication: Authentication;
  userPassword: string | null;
}

export function checkIdentity(identity: ServerIdentity): NormalizedIdentity {
  checkNickname(identity.nickName);
  checkAuthentication(identity.authentication, identity.userPassword);

  return {
    nickName: identity.nickName,
    userName: identity.userName ?? identity.nickName,
    realName: identity.realName ?? identity.nickName,
    authentication: identity.authentication,
    userPassword: identity.userPassword ?? null
  };
}

/** Validates a new server and fills in the defaulted fields. */
export function checkServerSpec(spec: ServerSpec): NewServerRecord {
  const host = checkHost(spec.host);
  checkPort(spec.port);

  return {
    host,
    port: spec.port,
    ...checkIdentity(spec),
    password: spec.password ?? null
  };
}
