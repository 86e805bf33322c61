/**
 * Qobuz Web Player 應用程式憑證
 * 從 Web Player 的 bundle.js 取出 app ID 與候選 app secret，並計算請求簽章
 */

import { createHash } from 'node:crypto';
import type { QueryValue } from '../../types/http.js';

export const WEB_PLAYER_URL = 'https://play.qobuz.com';

// secret 組合後尾端有固定長度的填充
const SECRET_PADDING_LENGTH = 44;

const BUNDLE_PATH_PATTERN = /\/resources\/[^"'\s]+\/bundle\.js/;
const APP_ID_PATTERN = /production:\{api:\{appId:"(.*?)",appSecret/;
const SEED_PATTERN = /[a-z]\.initialSeed\("(.*?)",window\.utimezone\.(.*?)\)/g;

export interface WebPlayerCredentials {
  appId: string;
  /** 依 bundle 中出現的順序排列，需逐一探測 */
  appSecrets: string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * 從登入頁 HTML 找出 bundle.js 的路徑，例如 /resources/8.1.0-b019/bundle.js
 */
export function findBundlePath(loginPage: string): string | null {
  return BUNDLE_PATH_PATTERN.exec(loginPage)?.[0] ?? null;
}

/**
 * 解析 bundle.js
 * 每個時區 seed 搭配同名城市的 info 與 extras，串接後去掉填充再 base64 解碼
 * @returns 找不到 app ID 時為 null
 */
export function parseBundle(bundle: string): WebPlayerCredentials | null {
  const appId = APP_ID_PATTERN.exec(bundle)?.[1];
  if (!appId) {
    return null;
  }

  const appSecrets: string[] = [];
  for (const [, seed = '', city = ''] of bundle.matchAll(SEED_PATTERN)) {
    const infoPattern = new RegExp(
      `${escapeRegExp(capitalize(city))}",info:"(.*?)",extras:"(.*?)"\\},\\{offset`
    );
    const match = infoPattern.exec(bundle);
    if (!match) continue;

    const [, info = '', extras = ''] = match;
    const encoded = `${seed}${info}${extras}`.slice(0, -SECRET_PADDING_LENGTH);
    appSecrets.push(Buffer.from(encoded, 'base64').toString('utf-8'));
  }

  return { appId, appSecrets };
}

/**
 * 簽章：MD5(去除斜線的端點 + 依鍵排序的 key+value + 時間戳 + app secret)
 * @example computeRequestSignature('track/getFileUrl', { track_id: 1 }, '1700000000', 'secret')
 */
export function computeRequestSignature(
  endpoint: string,
  params: Record<string, QueryValue>,
  timestamp: string,
  appSecret: string
): string {
  const serialized = Object.keys(params)
    .sort()
    .map((key) => `${key}${String(params[key])}`)
    .join('');
  return createHash('md5')
    .update(`${endpoint.replace(/\//g, '')}${serialized}${timestamp}${appSecret}`)
    .digest('hex');
}

/**
 * 密碼若不是 MD5 雜湊則先雜湊
 */
export function hashPassword(password: string): string {
  if (/^[a-f0-9]{32}$/i.test(password)) {
    return password.toLowerCase();
  }
  return createHash('md5').update(password).digest('hex');
}
