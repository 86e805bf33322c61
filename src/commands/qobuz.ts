/**
 * Qobuz Command
 * Private Qobuz API：登入、曲目查詢、搜尋
 */

import { Command } from 'commander';
import { outputData, outputError, renderTable } from '../lib/output-formatter.js';
import { validateChoice, validateInteger } from '../lib/validation.js';
import { PrivateQobuzApi, type PrivateQobuzApiOptions } from '../services/qobuz/client.js';
import { isJsonObject } from '../services/transport.js';
import type { JsonObject, JsonValue } from '../types/token.js';
import { getErrorFormat, getOutputFormat } from './options.js';

const SEARCH_TYPES = ['all', 'albums', 'artists', 'tracks'] as const;

interface AccountOptions {
  user?: string;
}

interface LoginOptions extends AccountOptions {
  username?: string;
  password?: string;
}

interface SearchCommandOptions extends AccountOptions {
  type: string;
  limit: string;
}

/**
 * 依 CLI 選項建立用戶端；指定 --user 時以已存 token 認證
 */
async function createClient(options: AccountOptions): Promise<PrivateQobuzApi> {
  const clientOptions: PrivateQobuzApiOptions =
    options.user === undefined
      ? {}
      : { authorizationFlow: 'password', userIdentifier: options.user };
  return PrivateQobuzApi.create(clientOptions);
}

function text(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function items(response: JsonObject, key?: string): JsonObject[] {
  const section = key === undefined ? response : response[key];
  if (!isJsonObject(section)) return [];
  const list = section.items;
  return Array.isArray(list) ? list.filter(isJsonObject) : [];
}

function nameOf(value: JsonValue | undefined): string | null {
  return isJsonObject(value) ? text(value.name) : null;
}

function renderTracks(tracks: JsonObject[]): string {
  return renderTable(
    ['ID', '曲名', '演出者', '長度（秒）'],
    tracks.map((track) => [text(track.id), text(track.title), nameOf(track.performer), text(track.duration)])
  );
}

export const qobuzCommand = new Command('qobuz').description('Private Qobuz API');

/**
 * tonearm qobuz login
 */
qobuzCommand
  .command('login')
  .description('以帳號密碼登入並儲存 token')
  .option('--username <username>', '帳號（預設讀取 QOBUZ_USERNAME）')
  .option('--password <password>', '密碼或其 MD5 雜湊（預設讀取 QOBUZ_PASSWORD）')
  .option('--user <identifier>', '帳號識別碼；加上 ~ 前綴強制重新登入')
  .action(async (options: LoginOptions, command: Command) => {
    try {
      const format = getOutputFormat(command);
      const client = await PrivateQobuzApi.create({
        authorizationFlow: 'password',
        username: options.username ?? process.env.QOBUZ_USERNAME,
        password: options.password ?? process.env.QOBUZ_PASSWORD,
        userIdentifier: options.user,
      });

      const result = {
        success: true,
        clientName: client.clientName,
        userIdentifier: client.getUserIdentifier(),
        source: client.getCredentialSource(),
      };
      outputData(
        result,
        format,
        () => `已登入 ${result.userIdentifier ?? '(unknown)'}（來源：${result.source ?? '-'}）`
      );
    } catch (error) {
      outputError(error, getErrorFormat(command));
    }
  });

/**
 * tonearm qobuz track <ids>
 */
qobuzCommand
  .command('track <ids>')
  .description('查詢曲目（多個 ID 以逗號分隔）')
  .option('--user <identifier>', '以已存 token 認證的帳號')
  .action(async (ids: string, options: AccountOptions, command: Command) => {
    try {
      const format = getOutputFormat(command);
      const client = await createClient(options);
      const response = await client.tracks.getTracks(ids);
      const tracks = 'tracks' in response ? items(response, 'tracks') : [response];
      outputData(response, format, () => renderTracks(tracks));
    } catch (error) {
      outputError(error, getErrorFormat(command));
    }
  });

/**
 * tonearm qobuz search <query>
 */
qobuzCommand
  .command('search <query>')
  .description('搜尋目錄')
  .option('-t, --type <type>', `搜尋類型: ${SEARCH_TYPES.join(' | ')}`, 'all')
  .option('-l, --limit <number>', '限制結果數量', '10')
  .option('--user <identifier>', '以已存 token 認證的帳號')
  .action(async (query: string, options: SearchCommandOptions, command: Command) => {
    try {
      const format = getOutputFormat(command);
      const type = validateChoice('search type', options.type, SEARCH_TYPES);
      const limit = validateInteger('limit', Number(options.limit), 1, 500);
      const client = await createClient(options);

      switch (type) {
        case 'albums': {
          const response = await client.search.searchAlbums(query, { limit });
          outputData(response, format, () =>
            renderTable(
              ['ID', '專輯', '演出者'],
              items(response, 'albums').map((album) => [
                text(album.id),
                text(album.title),
                nameOf(album.artist),
              ])
            )
          );
          return;
        }
        case 'artists': {
          const response = await client.search.searchArtists(query, { limit });
          outputData(response, format, () =>
            renderTable(
              ['ID', '藝人'],
              items(response, 'artists').map((artist) => [text(artist.id), text(artist.name)])
            )
          );
          return;
        }
        case 'tracks': {
          const response = await client.search.searchTracks(query, { limit });
          outputData(response, format, () => renderTracks(items(response, 'tracks')));
          return;
        }
        default: {
          const response = await client.search.search(query, { limit });
          outputData(response, format, () => renderTracks(items(response, 'tracks')));
        }
      }
    } catch (error) {
      outputError(error, getErrorFormat(command));
    }
  });
