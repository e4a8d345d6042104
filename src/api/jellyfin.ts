import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { JELLYFIN } from '../utils/constants';

const UserSchema = z.object({
  Id: z.string(),
  Name: z.string(),
  LastLoginDate: z.string().nullish(),
});

const ItemSchema = z.object({
  Id: z.string(),
  Name: z.string().nullish(),
  Path: z.string().nullish(),
  Type: z.string().nullish(),
  ParentId: z.string().nullish(),
});

const ItemsResponseSchema = z.object({
  Items: z.array(ItemSchema).default([]),
  TotalRecordCount: z.number().optional(),
});

export type JellyfinUser = z.infer<typeof UserSchema>;
export type JellyfinItem = z.infer<typeof ItemSchema>;

export type JellyfinHttp = Pick<AxiosInstance, 'get'>;

const ITEM_FIELDS = 'Path,Name,Type,ParentId';

export class JellyfinClient {
  private readonly http: JellyfinHttp;

  constructor(serverUrl: string, apiKey: string | null, http?: JellyfinHttp) {
    if (!apiKey) {
      throw new Error('JELLYFIN_API_KEY is not set. Create one under Dashboard > API Keys.');
    }

    this.http =
      http ??
      axios.create({
        baseURL: serverUrl,
        timeout: 30000,
        headers: {
          'X-MediaBrowser-Token': apiKey,
          'Content-Type': 'application/json',
        },
      });
  }

  async listUsers(): Promise<JellyfinUser[]> {
    const { data } = await this.http.get('/Users');
    return z.array(UserSchema).parse(data);
  }

  async listAlbums(): Promise<JellyfinItem[]> {
    return this.getItems({
      Recursive: 'true',
      IncludeItemTypes: 'MusicAlbum',
      Limit: JELLYFIN.ALBUM_LIMIT,
    });
  }

  async listTracks(albumId: string): Promise<JellyfinItem[]> {
    return this.getItems({
      ParentId: albumId,
      Recursive: 'false',
      IncludeItemTypes: 'Audio',
      Limit: JELLYFIN.TRACK_LIMIT,
    });
  }

  private async getItems(params: Record<string, string | number>): Promise<JellyfinItem[]> {
    const { data } = await this.http.get('/Items', {
      params: {
        Fields: ITEM_FIELDS,
        SortBy: 'SortName',
        SortOrder: 'Ascending',
        ...params,
      },
    });
    return ItemsResponseSchema.parse(data).Items;
  }
}
