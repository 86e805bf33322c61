/**
 * Web Player 測試資料：seed + info + extras 去掉 44 字元填充後，
 * 分別解碼為 test-secret-one 與 test-secret-two
 */

const PADDING = 'A'.repeat(44);

export const TEST_APP_ID = '100000000';

export const TEST_LOGIN_PAGE =
  '<html><head><script src="/resources/8.1.0-b019/bundle.js"></script></head></html>';

export const TEST_BUNDLE = [
  `var config={production:{api:{appId:"${TEST_APP_ID}",appSecret:"unused"}}};`,
  'a.initialSeed("dGVzdC1zZWNy",window.utimezone.berlin);',
  'b.initialSeed("dGVzdC1zZWNyZXQt",window.utimezone.london);',
  `zones=[{offset:"GMT+01:00",name:"Europe/Berlin",info:"ZXQtb25l",extras:"${PADDING}"},{offset:"GMT",name:"Europe/London",info:"dHdv",extras:"${PADDING}"},{offset:"GMT+09:00"}];`,
].join('\n');
