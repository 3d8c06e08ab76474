/**
 * File Credential Provider: Access tokens from JSON files.
 *
 * Tokens live at `<dir>/<provider>/<name>.json` and are written by an
 * external OAuth helper. The file is re-read on every call so a
 * refreshed token takes effect without a restart.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { CredentialError } from "./types.js";
import type { CredentialProvider } from "./types.js";

const CredentialFileSchema = z.object({
  access_token: z.string().min(1),
});

const SEGMENT = /^[a-z0-9_-]+$/;

export interface FileCredentialProviderOptions {
  readonly dir: string;
}

export class FileCredentialProvider implements CredentialProvider {
  private readonly dir: string;

  constructor(options: FileCredentialProviderOptions) {
    this.dir = options.dir;
  }

  /** Location of a credential file. Names are lower-cased. */
  pathFor(provider: string, name: string): string {
    const segments = [provider.toLowerCase(), name.toLowerCase()];
    for (const segment of segments) {
      if (!SEGMENT.test(segment)) {
        throw new CredentialError("INVALID_CREDENTIALS", `Invalid credential name "${segment}"`);
      }
    }
    const [providerDir, file] = segments;
    return join(this.dir, providerDir ?? "", `${file ?? ""}.json`);
  }

  /**
   * @throws CredentialError MISSING_CREDENTIALS if the file cannot be read
   * @throws CredentialError INVALID_CREDENTIALS if it holds no access token
   */
  async accessToken(provider: string, name: string): Promise<string> {
    const path = this.pathFor(provider, name);

    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (err: unknown) {
      throw new CredentialError(
        "MISSING_CREDENTIALS",
        `No credentials for ${provider}/${name} at ${path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new CredentialError("INVALID_CREDENTIALS", `Credentials for ${provider}/${name} are not valid JSON`);
    }

    const parsed = CredentialFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CredentialError("INVALID_CREDENTIALS", `Credentials for ${provider}/${name} have no access_token`);
    }
    return parsed.data.access_token;
  }
}
