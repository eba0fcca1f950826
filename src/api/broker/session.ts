/**
 * Session state owned by the gateway.
 *
 * Holds credentials, the session token, the user token, the derived endpoint
 * map, the account snapshot and the cookie jar. Nothing outside BrokerClient
 * touches an instance directly.
 */

import type { AccountSnapshot, EndpointMap } from "../../types/broker.js";
import type { SessionSecrets } from "../../storage/secrets.js";

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

/** Name/value cookie store fed by Set-Cookie headers */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.cookies.set(name, value);
    }
  }

  /** Absorb every Set-Cookie line of a response */
  store(headers: Headers): void {
    for (const line of headers.getSetCookie()) {
      const pair = line.split(";", 1)[0] ?? "";
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      if (value === "" || /max-age=0/i.test(line)) {
        this.cookies.delete(name);
      } else {
        this.cookies.set(name, value);
      }
    }
  }

  set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  /** Cookie request header, or undefined when empty */
  header(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.cookies);
  }
}

export class SessionState {
  sessionToken: string | undefined;
  userToken: number | undefined;
  endpoints: EndpointMap | undefined;
  account: AccountSnapshot | undefined;
  readonly cookies: CookieJar;

  constructor(readonly credentials: Credentials, restored?: SessionSecrets) {
    this.sessionToken = restored?.sessionToken;
    this.userToken = restored?.userToken;
    this.cookies = new CookieJar(restored?.cookies);
  }

  /** Store a fresh token; the upstream also expects it as the session cookie */
  acceptSession(token: string): void {
    this.sessionToken = token;
    this.cookies.set("JSESSIONID", token);
  }

  /**
   * Clear the session only if it is still the token that was rejected, so a
   * fresher token obtained by a concurrent caller survives.
   */
  clearSession(rejected: string | undefined): boolean {
    if (rejected === undefined || this.sessionToken !== rejected) return false;
    this.sessionToken = undefined;
    return true;
  }

  toSecrets(): SessionSecrets {
    return {
      sessionToken: this.sessionToken,
      userToken: this.userToken,
      cookies: this.cookies.toRecord(),
    };
  }
}
