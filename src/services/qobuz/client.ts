/**
 * Private Qobuz API 用戶端
 *
 * 應用程式憑證來源：明確傳入 > 環境變數 > Web Player bundle.js
 * 使用者憑證來源：明確傳入 token > 已存 token > 帳號密碼登入
 */

import { loggers } from '../../lib/logger.js';
import { ValidationError } from '../../lib/validation.js';
import type { TransportRequest } from '../../types/http.js';
import type { CredentialFilter, CredentialSummary, JsonValue } from '../../types/token.js';
import {
  ApiClient,
  AuthenticationRequiredError,
  type ApiClientOptions,
  type ApiRequest,
} from '../api-client.js';
import {
  AuthPipeline,
  NoValidCredentialError,
  type AuthenticationResult,
  type AuthFlow,
  type AuthRequest,
  type CredentialSource,
  type EstablishedCredential,
} from '../auth.js';
import { getConfigService, type ConfigService } from '../config.js';
import { getTokenStore, type TokenStore } from '../token-store.js';
import { ApiRequestError, isJsonObject } from '../transport.js';
import { AlbumsApi } from './albums.js';
import { ArtistsApi } from './artists.js';
import { FavoritesApi } from './favorites.js';
import { GenresApi } from './genres.js';
import { LabelsApi } from './labels.js';
import { PlaylistsApi } from './playlists.js';
import { SearchApi } from './search.js';
import { TracksApi } from './tracks.js';
import { UsersApi } from './users.js';
import {
  computeRequestSignature,
  findBundlePath,
  parseBundle,
  WEB_PLAYER_URL,
  type WebPlayerCredentials,
} from './web-player.js';

export const PRIVATE_QOBUZ_BASE_URL = 'https://www.qobuz.com/api.json/0.2';
export const PRIVATE_QOBUZ_CLIENT_NAME = 'PrivateQobuzAPI';

const ENV_PREFIX = 'PRIVATE_QOBUZ_API';

// 探測 secret 用的公開曲目
const PROBE_TRACK_ID = 344521217;
const PROBE_FORMAT_ID = 5;

export type QobuzAuthorizationFlow = 'password';

export interface QobuzRequestCredentials {
  appSecret?: string;
  userAuthToken?: string;
}

export interface QobuzRequest extends ApiRequest {
  /** 加上 request_ts 與 request_sig */
  signed?: boolean;
  /** 覆寫這次請求使用的憑證（探測 secret、登入後查詢個人資料） */
  credentials?: QobuzRequestCredentials;
}

export interface PrivateQobuzApiOptions extends ApiClientOptions {
  /** 省略時：有 token 或帳號時為 'password'，否則不認證 */
  authorizationFlow?: QobuzAuthorizationFlow | null;
  appId?: string;
  /** 可為多個候選值，登入後逐一探測 */
  appSecret?: string | readonly string[];
  /** 帳號識別碼（Qobuz user ID）；`~` 開頭表示略過已存 token */
  userIdentifier?: string | null;
  userAuthToken?: string;
  username?: string;
  /** 明文或 MD5 雜湊 */
  password?: string;
  /** false 停用 token store；省略時使用預設 store */
  store?: TokenStore | boolean;
  config?: ConfigService;
}

function readIdentifier(value: JsonValue | undefined): string | null {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function resolveStore(store: TokenStore | boolean | undefined): TokenStore | null {
  if (store === false) return null;
  if (store === undefined || store === true) return getTokenStore();
  return store;
}

export class PrivateQobuzApi extends ApiClient<QobuzRequest> {
  readonly clientName = PRIVATE_QOBUZ_CLIENT_NAME;

  readonly albums: AlbumsApi;
  readonly artists: ArtistsApi;
  readonly favorites: FavoritesApi;
  readonly genres: GenresApi;
  readonly labels: LabelsApi;
  readonly playlists: PlaylistsApi;
  readonly search: SearchApi;
  readonly tracks: TracksApi;
  readonly users: UsersApi;

  private authorizationFlow: QobuzAuthorizationFlow | null = null;
  private appId: string | null = null;
  private appSecret: string | null = null;
  private userAuthToken: string | null = null;
  private userIdentifier: string | null = null;
  private credentialSource: CredentialSource | null = null;
  private loginCredentials: { username: string; password: string } | null = null;
  private pipeline: AuthPipeline | null = null;
  private authRequest: AuthRequest | null = null;
  private reauthenticated = false;

  private constructor(options: PrivateQobuzApiOptions) {
    super(options);
    this.albums = new AlbumsApi(this);
    this.artists = new ArtistsApi(this);
    this.favorites = new FavoritesApi(this);
    this.genres = new GenresApi(this);
    this.labels = new LabelsApi(this);
    this.playlists = new PlaylistsApi(this);
    this.search = new SearchApi(this);
    this.tracks = new TracksApi(this);
    this.users = new UsersApi(this);
  }

  /**
   * 建立用戶端並完成憑證解析與（視需要）登入
   * @throws ApiRequestError 取得 Web Player 憑證或登入失敗
   * @throws NoValidCredentialError 沒有任何候選 secret 可用
   * @throws StoreUnavailableError token store 無法存取
   */
  static async create(options: PrivateQobuzApiOptions = {}): Promise<PrivateQobuzApi> {
    const client = new PrivateQobuzApi(options);
    await client.initialize(options);
    return client;
  }

  /**
   * 列出這個用戶端已存的 token（不含 secret）
   */
  static async getTokens(
    filter: Omit<CredentialFilter, 'clientNames'> = {},
    store: TokenStore = getTokenStore()
  ): Promise<CredentialSummary[]> {
    return store.list({ ...filter, clientNames: PRIVATE_QOBUZ_CLIENT_NAME });
  }

  /**
   * 刪除這個用戶端已存的 token
   *
   * 注意：不帶條件會刪除這個用戶端的所有 token
   * @returns 刪除的筆數
   */
  static async removeTokens(
    filter: Omit<CredentialFilter, 'clientNames'> = {},
    store: TokenStore = getTokenStore()
  ): Promise<number> {
    if (Object.values(filter).every((value) => value === undefined)) {
      loggers.tokens.warn('Removing every stored token for client', {
        clientName: PRIVATE_QOBUZ_CLIENT_NAME,
      });
    }
    return store.remove({ ...filter, clientNames: PRIVATE_QOBUZ_CLIENT_NAME });
  }

  getAppId(): string | null {
    return this.appId;
  }

  getAuthorizationFlow(): QobuzAuthorizationFlow | null {
    return this.authorizationFlow;
  }

  getUserIdentifier(): string | null {
    return this.userIdentifier;
  }

  getCredentialSource(): CredentialSource | null {
    return this.credentialSource;
  }

  isAuthenticated(): boolean {
    return this.userAuthToken !== null;
  }

  /**
   * @throws AuthenticationRequiredError 用戶端未進行使用者認證
   */
  requireAuthentication(operation: string): void {
    if (this.authorizationFlow === null || this.userAuthToken === null) {
      throw new AuthenticationRequiredError(`${this.clientName}.${operation}`);
    }
  }

  protected decorate(request: QobuzRequest): TransportRequest {
    if (this.appId === null) {
      throw new ValidationError('appId', 'An app ID is required to call the private Qobuz API.');
    }

    const headers: Record<string, string> = { 'X-App-Id': this.appId };
    const userAuthToken = request.credentials?.userAuthToken ?? this.userAuthToken;
    if (userAuthToken) {
      headers['X-User-Auth-Token'] = userAuthToken;
    }

    let query = request.query;
    if (request.signed) {
      const appSecret = request.credentials?.appSecret ?? this.appSecret;
      if (!appSecret) {
        throw new NoValidCredentialError(0, this.clientName);
      }
      const timestamp = String(Math.floor(Date.now() / 1000));
      query = {
        ...request.query,
        request_ts: timestamp,
        request_sig: computeRequestSignature(
          request.endpoint,
          request.query ?? {},
          timestamp,
          appSecret
        ),
      };
    }

    return {
      method: request.method,
      url: request.endpoint,
      baseURL: PRIVATE_QOBUZ_BASE_URL,
      query,
      form: request.form,
      json: request.json,
      headers,
    };
  }

  /**
   * 已存 token 被拒時，以帳號密碼重新登入一次
   */
  protected async recoverFromUnauthorized(): Promise<boolean> {
    if (
      this.credentialSource !== 'store' ||
      this.reauthenticated ||
      !this.loginCredentials ||
      !this.pipeline ||
      !this.authRequest
    ) {
      return false;
    }

    this.reauthenticated = true;
    loggers.auth.warn('Stored token rejected, signing in again', {
      clientName: this.clientName,
      userIdentifier: this.userIdentifier,
    });

    const credential = await this.pipeline.reauthenticate(
      {
        ...this.authRequest,
        clientSecret: this.authRequest.clientSecret ?? this.appSecret,
        userIdentifier: this.userIdentifier,
      },
      this.createAuthFlow()
    );
    this.apply(credential);
    this.clearCache();
    return true;
  }

  private async initialize(options: PrivateQobuzApiOptions): Promise<void> {
    const config = options.config ?? getConfigService();
    const env = config.getAppCredentials(ENV_PREFIX);

    const authorizationFlow =
      options.authorizationFlow !== undefined
        ? options.authorizationFlow
        : options.userAuthToken || options.username
          ? 'password'
          : null;

    let appId = options.appId ?? env.appId;
    const appSecret = options.appSecret ?? env.appSecret ?? null;
    let fallbackSecrets: readonly string[] | undefined;

    if (!appId) {
      const webPlayer = await this.fetchWebPlayerCredentials();
      appId = webPlayer.appId;
      fallbackSecrets = webPlayer.appSecrets;
    }
    this.appId = appId;

    if (authorizationFlow === null) {
      // 未登入無法探測，只接受單一 secret
      if (typeof appSecret === 'string') {
        this.appSecret = appSecret;
      } else if (appSecret?.length === 1) {
        this.appSecret = appSecret[0] ?? null;
      }
      loggers.api.debug('Client ready without user authentication', { clientName: this.clientName });
      return;
    }

    this.authorizationFlow = authorizationFlow;
    if (options.username && options.password) {
      this.loginCredentials = { username: options.username, password: options.password };
    }
    this.pipeline = new AuthPipeline({ store: resolveStore(options.store) });
    this.authRequest = {
      clientName: this.clientName,
      authorizationFlow,
      clientId: appId,
      clientSecret: appSecret,
      fallbackSecrets,
      userIdentifier: options.userIdentifier,
      accessToken: options.userAuthToken ?? null,
    };

    this.apply(await this.pipeline.establish(this.authRequest, this.createAuthFlow()));
  }

  private apply(credential: EstablishedCredential): void {
    this.credentialSource = credential.source;
    this.userAuthToken = credential.accessToken;
    this.appSecret = credential.clientSecret;
    this.userIdentifier = credential.userIdentifier;
  }

  private createAuthFlow(): AuthFlow {
    return {
      authenticate: async (): Promise<AuthenticationResult> => {
        if (!this.loginCredentials) {
          throw new ValidationError(
            'password',
            'A username and password are required to sign in to the private Qobuz API.'
          );
        }
        const { username, password } = this.loginCredentials;
        const { user_auth_token, token, ...extras } = await this.users.login(username, password);

        const accessToken = readIdentifier(user_auth_token) ?? readIdentifier(token);
        if (accessToken === null) {
          throw new ApiRequestError('user/login', undefined, 'response has no user authentication token');
        }
        return { accessToken, extras };
      },

      probeSecret: async (secret: string, accessToken: string): Promise<void> => {
        await this.request({
          method: 'GET',
          endpoint: 'track/getFileUrl',
          query: { format_id: PROBE_FORMAT_ID, intent: 'stream', track_id: PROBE_TRACK_ID },
          signed: true,
          credentials: { appSecret: secret, userAuthToken: accessToken },
          replayOnUnauthorized: false,
        });
      },

      resolveUserIdentifier: async (result: AuthenticationResult): Promise<string | null> => {
        const extras = result.extras ?? {};
        const user = extras.user;
        const fromLogin =
          readIdentifier(extras.user_id) ?? (isJsonObject(user) ? readIdentifier(user.id) : null);
        if (fromLogin !== null) {
          return fromLogin;
        }

        const profile = await this.request({
          method: 'GET',
          endpoint: 'user/get',
          credentials: { userAuthToken: result.accessToken },
          replayOnUnauthorized: false,
        });
        return readIdentifier(profile.id);
      },
    };
  }

  private async fetchWebPlayerCredentials(): Promise<WebPlayerCredentials> {
    return loggers.auth.trackAsync('Web player credential lookup', async () => {
      const loginPage = await this.fetchText('/login', WEB_PLAYER_URL);
      const bundlePath = findBundlePath(loginPage);
      if (!bundlePath) {
        throw new ApiRequestError('/login', undefined, 'bundle.js not referenced by the login page');
      }

      const credentials = parseBundle(await this.fetchText(bundlePath, WEB_PLAYER_URL));
      if (!credentials) {
        throw new ApiRequestError(bundlePath, undefined, 'app ID not found in bundle.js');
      }
      loggers.auth.debug('Web player credentials found', {
        candidates: credentials.appSecrets.length,
      });
      return credentials;
    });
  }
}
