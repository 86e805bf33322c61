/**
 * 端點參數驗證與序列化
 */

export class ValidationError extends Error {
  public readonly code = 'INVALID_ARGUMENT';
  public readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.parameter = parameter;
  }
}

/** 單一或多個數字 ID；字串可用逗號分隔 */
export type NumericIds = number | string | readonly (number | string)[];

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * 驗證單一數字 ID
 */
export function validateNumericId(name: string, id: number | string): number {
  if (typeof id === 'number') {
    if (!Number.isSafeInteger(id) || id < 0) {
      throw new ValidationError(name, `Invalid ${name} ${id}.`);
    }
    return id;
  }

  const trimmed = id.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(name, `Invalid ${name} '${id}'.`);
  }
  return Number(trimmed);
}

/**
 * 正規化一或多個數字 ID 為陣列
 * @example prepareNumericIds('trackIds', '23929516, 344521217') // [23929516, 344521217]
 */
export function prepareNumericIds(name: string, ids: NumericIds): number[] {
  const list = typeof ids === 'string' ? splitList(ids) : typeof ids === 'number' ? [ids] : ids;
  if (list.length === 0) {
    throw new ValidationError(name, `At least one ID must be specified for ${name}.`);
  }
  return list.map((id) => validateNumericId(name, id));
}

/**
 * 專輯 ID 為英數字串（例如 'ho1xc2bmmn5ra'）
 */
export function validateAlbumId(albumId: string): string {
  const trimmed = albumId.trim();
  if (!/^[A-Za-z0-9]+$/.test(trimmed)) {
    throw new ValidationError('albumId', `Album ID '${albumId}' is not alphanumeric.`);
  }
  return trimmed;
}

export function prepareAlbumIds(albumIds: string | readonly string[]): string {
  const list = typeof albumIds === 'string' ? splitList(albumIds) : albumIds;
  if (list.length === 0) {
    throw new ValidationError('albumIds', 'At least one album ID must be specified.');
  }
  return list.map(validateAlbumId).join(',');
}

/**
 * 驗證整數範圍（上下限皆包含）
 */
export function validateInteger(
  name: string,
  value: number,
  lowerBound?: number,
  upperBound?: number
): number {
  let range = '';
  if (lowerBound !== undefined && upperBound !== undefined) {
    range = ` between ${lowerBound} and ${upperBound}, inclusive`;
  } else if (lowerBound !== undefined) {
    range = ` greater than or equal to ${lowerBound}`;
  } else if (upperBound !== undefined) {
    range = ` less than or equal to ${upperBound}`;
  }

  if (
    !Number.isInteger(value) ||
    (lowerBound !== undefined && value < lowerBound) ||
    (upperBound !== undefined && value > upperBound)
  ) {
    throw new ValidationError(name, `${name} must be an integer${range}.`);
  }
  return value;
}

/**
 * 驗證列舉值（去除空白、轉小寫後比對）
 */
export function validateChoice<T extends string>(
  name: string,
  value: string,
  allowed: readonly T[]
): T {
  const normalized = value.trim().toLowerCase();
  const match = allowed.find((choice) => choice.toLowerCase() === normalized);
  if (match === undefined) {
    throw new ValidationError(
      name,
      `Invalid ${name} '${value}'. Valid values: '${allowed.join("', '")}'.`
    );
  }
  return match;
}

/**
 * 驗證並序列化逗號分隔的列舉值
 */
export function prepareChoices<T extends string>(
  name: string,
  values: string | readonly string[],
  allowed: readonly T[]
): string {
  const list = typeof values === 'string' ? splitList(values) : values;
  return list.map((value) => validateChoice(name, value, allowed)).join(',');
}

export function validateNonEmpty(name: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(name, `${name} must not be empty.`);
  }
  return trimmed;
}
