export const MEMBERSHIP_ERROR_CODES = {
  EVENT_NOT_FOUND: "EVENT_NOT_FOUND",
  EVENT_NOT_JOINABLE: "EVENT_NOT_JOINABLE",
  CANNOT_MATCH_OWN_EVENT: "CANNOT_MATCH_OWN_EVENT",
  CHAT_UNAVAILABLE: "CHAT_UNAVAILABLE",
} as const;

export type MembershipErrorCode =
  (typeof MEMBERSHIP_ERROR_CODES)[keyof typeof MEMBERSHIP_ERROR_CODES];

const STATUS_BY_CODE: Record<MembershipErrorCode, number> = {
  EVENT_NOT_FOUND: 404,
  EVENT_NOT_JOINABLE: 409,
  CANNOT_MATCH_OWN_EVENT: 400,
  CHAT_UNAVAILABLE: 500,
};

export class MembershipError extends Error {
  readonly code: MembershipErrorCode;
  readonly status: number;

  constructor(code: MembershipErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MembershipError";
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }
}
