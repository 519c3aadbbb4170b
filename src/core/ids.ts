import { ulid } from "ulid";

export type SubmissionId = `sub_${string}`;

export function newSubmissionId(): SubmissionId {
  return `sub_${ulid()}`;
}

export function isSubmissionId(value: string): value is SubmissionId {
  return /^sub_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}
