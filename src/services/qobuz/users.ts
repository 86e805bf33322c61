import { validateNonEmpty } from '../../lib/validation.js';
import type { JsonObject } from '../../types/token.js';
import { QobuzResourceApi } from './resource.js';
import { hashPassword } from './web-player.js';

export class UsersApi extends QobuzResourceApi {
  readonly getMyProfile = this.cached('user', 'getMyProfile', async () => {
    this.client.requireAuthentication('users.getMyProfile');
    return this.client.request({ method: 'GET', endpoint: 'user/get' });
  });

  /**
   * 以帳號密碼登入；密碼以 MD5 雜湊傳送
   * 回應含 user_auth_token 與使用者資料
   */
  async login(username: string, password: string): Promise<JsonObject> {
    return this.client.request({
      method: 'POST',
      endpoint: 'user/login',
      query: {
        username: validateNonEmpty('username', username),
        password: hashPassword(validateNonEmpty('password', password)),
      },
      replayOnUnauthorized: false,
    });
  }
}
