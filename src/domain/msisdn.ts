const LOCAL_MSISDN_LENGTH = 10;

export interface NormalizedMsisdn {
  msisdn: string;
  complete: boolean;
}

/**
 * Normalizes a subscriber number to the gateway's local `07XXXXXXXX` form.
 * Numbers shorter than ten digits are returned with `complete: false`.
 */
export function normalizeMsisdn(raw: string): NormalizedMsisdn {
  let digits = raw.replace(/\D/g, "");
  if (digits.startsWith("254")) {
    digits = `0${digits.slice(3)}`;
  }
  if (!digits.startsWith("0")) {
    digits = `0${digits}`;
  }
  if (digits.length > LOCAL_MSISDN_LENGTH) {
    digits = digits.slice(0, LOCAL_MSISDN_LENGTH);
  }
  return { msisdn: digits, complete: digits.length === LOCAL_MSISDN_LENGTH };
}
