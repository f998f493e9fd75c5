export const BUCKET_NAME_RULES = [
  "LengthError",
  "CharsetError",
  "AdjacentPeriodsError",
  "IPFormatError",
  "PunycodePrefixError",
] as const;

export type BucketNameRule = (typeof BUCKET_NAME_RULES)[number];

export type BucketNameResult =
  | { valid: true }
  | { valid: false; rule: BucketNameRule; message: string };

const MIN_LENGTH = 3;
const MAX_LENGTH = 63;

const ALLOWED_PATTERN = /^[a-z0-9][a-z0-9.-]*[a-z0-9]$/;
const IPV4_PATTERN = /^\d+\.\d+\.\d+\.\d+$/;

export const BUCKET_NAMING_RULES = [
  "3-63 characters: lowercase letters, numbers, dots and hyphens only",
  "Must start and end with a letter or number",
  "No adjacent periods, IP addresses, or 'xn--' prefix",
  "Examples: my-bucket, data.storage123",
] as const;

const invalid = (rule: BucketNameRule, message: string): BucketNameResult => ({
  valid: false,
  rule,
  message,
});

/**
 * Checks a candidate bucket name against the S3 naming rules. Rules are
 * evaluated in a fixed order and the first failing rule is reported.
 */
export const validateBucketName = (name: string): BucketNameResult => {
  if (name.length < MIN_LENGTH || name.length > MAX_LENGTH) {
    return invalid("LengthError", "Bucket name must be between 3 and 63 characters");
  }

  if (!ALLOWED_PATTERN.test(name)) {
    return invalid(
      "CharsetError",
      "Bucket name can only contain lowercase letters, numbers, dots, and hyphens, and must start and end with a letter or number",
    );
  }

  if (name.includes("..")) {
    return invalid("AdjacentPeriodsError", "Bucket name cannot contain two adjacent periods");
  }

  if (IPV4_PATTERN.test(name)) {
    return invalid("IPFormatError", "Bucket name cannot be formatted as an IP address");
  }

  if (name.startsWith("xn--")) {
    return invalid("PunycodePrefixError", "Bucket name cannot start with 'xn--'");
  }

  return { valid: true };
};
