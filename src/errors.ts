export abstract class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// 呼び出し側の入力不備（空の検索語など）。リトライ不可
export class InvalidArgumentError extends AppError {
  constructor(message: string, code: string = 'INVALID_ARGUMENT') {
    super(message, code);
  }
}

export class TypeMismatchError extends InvalidArgumentError {
  constructor(message: string) {
    super(message, 'TYPE_MISMATCH');
  }
}

export class ArticleValidationError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_ARTICLE');
  }
}

/**
 * 検索プロバイダがエラーを返した。
 * `status` はHTTPステータスが得られた場合のみ設定される。
 */
export class UpstreamError extends AppError {
  public readonly status?: number;

  constructor(message: string, status?: number, code: string = 'UPSTREAM_ERROR') {
    super(message, code);
    this.status = status;
  }
}

export class RateLimitedError extends UpstreamError {
  constructor(message: string = 'Rate limit exceeded') {
    super(message, 429, 'RATE_LIMITED');
  }
}

// 元のエラーは cause に保持し、message には含めない
export class PublishError extends AppError {
  constructor(message: string, options?: ErrorOptions, code: string = 'PUBLISH_ERROR') {
    super(message, code, options);
  }
}

export class RecordTooLargeError extends PublishError {
  public readonly recordSize: number;
  public readonly maxSize: number;

  constructor(recordSize: number, maxSize: number) {
    super(`Record size ${recordSize} bytes exceeds limit of ${maxSize} bytes`, undefined, 'RECORD_TOO_LARGE');
    this.recordSize = recordSize;
    this.maxSize = maxSize;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', options);
  }
}
