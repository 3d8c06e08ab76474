/**
 * Spotify Client: Counts liked tracks for the savings sweep.
 *
 * Liked tracks come back newest first, a page at a time; paging stops
 * at the first track liked before the window opened.
 */

import type { LikedTrackFeed } from "@potkeeper/automation";
import { z } from "zod";
import { HttpClient } from "./http-client.js";
import { ApiError } from "./types.js";
import type { CredentialProvider, HttpClientConfig } from "./types.js";

export const SPOTIFY_CREDENTIALS = "spotify";
export const SPOTIFY_PAGE_SIZE = 50;

const SavedTracksPageSchema = z.object({
  items: z.array(
    z.object({
      added_at: z.string().refine((s) => !Number.isNaN(Date.parse(s)), "invalid timestamp"),
    }),
  ),
  next: z.string().nullable(),
});

export interface SpotifyClientOptions extends Omit<HttpClientConfig, "retries"> {
  readonly credentials: CredentialProvider;
  /** Credential file name under `spotify/`. Default: "default" */
  readonly credentialName?: string | undefined;
}

export class SpotifyClient implements LikedTrackFeed {
  private readonly http: HttpClient;
  private readonly credentials: CredentialProvider;
  private readonly credentialName: string;

  constructor(options: SpotifyClientOptions) {
    const { credentials, credentialName, ...httpConfig } = options;
    this.http = new HttpClient({ ...httpConfig, retries: 3 });
    this.credentials = credentials;
    this.credentialName = credentialName ?? "default";
  }

  /**
   * @throws ApiError or CredentialError
   */
  async likedTracksSince(since: Date): Promise<number> {
    const token = await this.credentials.accessToken(SPOTIFY_CREDENTIALS, this.credentialName);
    const sinceMs = since.getTime();
    let count = 0;

    for (let offset = 0; ; offset += SPOTIFY_PAGE_SIZE) {
      const response = await this.http.get(`/v1/me/tracks?limit=${SPOTIFY_PAGE_SIZE}&offset=${offset}`, { token });
      const parsed = SavedTracksPageSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new ApiError("INVALID_RESPONSE", `Unexpected saved tracks response: ${parsed.error.message}`, response.status);
      }

      const { items, next } = parsed.data;
      const recent = items.filter((item) => Date.parse(item.added_at) >= sinceMs).length;
      count += recent;

      if (recent < items.length || next === null || items.length === 0) {
        return count;
      }
    }
  }
}
