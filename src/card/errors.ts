/**
 * 카드 입력 또는 사진 업로드가 유효하지 않을 때 throw된다.
 * 필수 필드 누락, 길이 제한 위반, 허용되지 않은 확장자, 크기 초과 등에서 사용되며
 * 어떤 변경도 일어나기 전에 발생한다.
 *
 * @example
 * throw new CardValidationError('name: must not be empty');
 */
export class CardValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CardValidationError';
  }
}

/**
 * 요청한 id에 해당하는 카드가 존재하지 않을 때 throw된다.
 * 정상적인 결과 중 하나이므로 실패로 로그하지 않는다.
 */
export class CardNotFoundError extends Error {
  constructor(public readonly id: number) {
    super(`Card not found: ${id}`);
    this.name = 'CardNotFoundError';
  }
}

/**
 * SQLite 또는 파일시스템 작업이 실패했을 때 throw된다.
 * 원래 에러는 `cause`로 보존된다. 트랜잭션으로 묶인 aggregate 쓰기는 이미 롤백된 상태다.
 */
export class CardStorageError extends Error {
  constructor(cause: unknown) {
    super(`Storage operation failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'CardStorageError';
  }
}

/**
 * 사진 파일 쓰기 성공 후 DB 갱신이 실패하고, 새 파일 삭제(보상)까지 실패한 때 throw된다.
 * `originalError`와 `compensationError` 모두를 포함하므로 로그로 기록해야 한다.
 * 이 상태에서는 참조되지 않는 업로드 파일이 남으며 `reconcileUploads`로 정리할 수 있다.
 */
export class CompensationError extends Error {
  constructor(
    public readonly originalError: unknown,
    public readonly compensationError: unknown,
  ) {
    super('Compensation failed after operation error');
    this.name = 'CompensationError';
  }
}
