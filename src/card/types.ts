/**
 * 카드에 속한 전화번호.
 * `id`는 업데이트마다 새로 발급되므로 식별자로 보관하지 않는다.
 */
export interface Phone {
  id: number;
  /** e.g. `'mobile'`, `'work'` */
  label: string;
  number: string;
}

/** 카드에 속한 이메일 주소. */
export interface Email {
  id: number;
  label: string;
  address: string;
}

/** 카드에 속한 우편 주소. */
export interface Address {
  id: number;
  label: string;
  street: string;
  city: string;
  country: string;
  postal: string;
}

/** 입력용 전화번호. `label` 생략 시 `'mobile'`. */
export interface PhoneInput {
  label?: string;
  number: string;
}

/** 입력용 이메일. `label` 생략 시 `'work'`. */
export interface EmailInput {
  label?: string;
  address: string;
}

/** 입력용 주소. `label` 생략 시 `'office'`, 나머지 필드는 빈 문자열. */
export interface AddressInput {
  label?: string;
  street?: string;
  city?: string;
  country?: string;
  postal?: string;
}

/**
 * `createCard` / `updateCard`에 전달하는 카드 전체 입력.
 * 업데이트는 부분 패치가 아니라 전체 교체다. 생략된 컬렉션은 빈 배열로 교체된다.
 */
export interface CardInput {
  /** 필수. 앞뒤 공백 제거 후 비어 있으면 안 된다. */
  name: string;
  title?: string;
  company?: string;
  website?: string;
  notes?: string;
  phones?: PhoneInput[];
  emails?: EmailInput[];
  addresses?: AddressInput[];
  /** 태그 이름 목록. 공백 항목은 무시되고 중복은 하나로 합쳐진다. */
  tags?: string[];
}

/**
 * 완전히 적재(hydrate)된 카드 aggregate.
 */
export interface Card {
  id: number;
  name: string;
  title: string;
  company: string;
  website: string;
  notes: string;
  /** 사진이 없으면 `''`, 있으면 `'/' + photoPath`. */
  photoUrl: string;
  phones: Phone[];
  emails: Email[];
  addresses: Address[];
  /** 이름 오름차순. */
  tags: string[];
  createdAt: string;
  updatedAt: string;
}

/** 태그와 현재 연결된 카드 수. */
export interface TagUsage {
  name: string;
  count: number;
}

/**
 * `listCards` 검색 조건.
 * 빈 문자열(공백만 있는 경우 포함)은 조건 없음과 같다.
 */
export interface CardListFilter {
  /** name, company, email 주소에 대한 대소문자 무시 부분 일치. */
  q?: string;
  /** 정확히 일치하는 태그 이름. */
  tag?: string;
}
