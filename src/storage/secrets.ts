/**
 * Session secrets persistence: JSON file storage
 *
 * Keeps the last session token, user token and cookies in data/secrets.json
 * so a restarted gateway resumes its session without logging in again.
 * Credentials are never written here.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { agentLogger, describeError } from "../utils/logger.js";

const log = agentLogger("secrets");

// ── Schema ──────────────────────────────────────────────────

export const SessionSecretsSchema = z.object({
  sessionToken: z.string().optional(),
  userToken: z.number().optional(),
  cookies: z.record(z.string()).default({}),
});

export type SessionSecrets = z.infer<typeof SessionSecretsSchema>;

// ── Store ───────────────────────────────────────────────────

export class SecretsStore {
  readonly file: string;

  constructor(dataDir: string) {
    this.file = path.join(dataDir, "secrets.json");
  }

  /** Missing or unreadable file means a fresh session */
  load(): SessionSecrets {
    try {
      if (!fs.existsSync(this.file)) {
        return { cookies: {} };
      }
      return SessionSecretsSchema.parse(JSON.parse(fs.readFileSync(this.file, "utf-8")));
    } catch (err) {
      log.warn("Ignoring unreadable secrets file", { error: describeError(err) });
      return { cookies: {} };
    }
  }

  /** Atomic write (tmp + rename) */
  save(secrets: SessionSecrets): void {
    const validated = SessionSecretsSchema.parse(secrets);
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    const tmpFile = this.file + ".tmp";
    fs.writeFileSync(tmpFile, JSON.stringify(validated, null, 2), { encoding: "utf-8", mode: 0o600 });
    fs.renameSync(tmpFile, this.file);
  }
}
