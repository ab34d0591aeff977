import { emailDomainOf, hostnameOf, stripWww } from "./checks/urlChecks.js";

export interface FieldValidationInput {
  companyEin?: string;
  streetAddress?: string;
  supportEmail?: string;
  supportPhone?: string;
  brandWebsite?: string;
}

export interface FieldValidationResult {
  einValid?: boolean;
  addressValid?: boolean;
  emailValid?: boolean;
  emailDomainMatch?: boolean;
  phoneValid?: boolean;
}

const STATE_ABBREVIATIONS =
  /\b(al|ak|az|ar|ca|co|ct|de|fl|ga|hi|id|il|in|ia|ks|ky|la|me|md|ma|mi|mn|ms|mo|mt|ne|nv|nh|nj|nm|ny|nc|nd|oh|ok|or|pa|ri|sc|sd|tn|tx|ut|vt|va|wa|wv|wi|wy)\b/;
const STATE_NAMES =
  /\b(alabama|alaska|arizona|arkansas|california|colorado|connecticut|delaware|florida|georgia|hawaii|idaho|illinois|indiana|iowa|kansas|kentucky|louisiana|maine|maryland|massachusetts|michigan|minnesota|mississippi|missouri|montana|nebraska|nevada|new hampshire|new jersey|new mexico|new york|north carolina|north dakota|ohio|oklahoma|oregon|pennsylvania|rhode island|south carolina|south dakota|tennessee|texas|utah|vermont|virginia|washington|west virginia|wisconsin|wyoming)\b/;
const STREET_WORD = /\b(street|st|avenue|ave|road|rd|drive|dr|lane|ln|boulevard|blvd|parkway|pkwy|suite|ste)\b/;
const ZIP = /\b\d{5}(-\d{4})?\b/;
const EMAIL = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEin(ein: string): boolean {
  return ein.replace(/\D/g, "").length === 9;
}

export function isValidAddress(address: string): boolean {
  const trimmed = address.trim();
  if (trimmed.length < 10) return false;
  const lowered = trimmed.toLowerCase();
  const hasNumber = /\d+/.test(trimmed);
  const hasState = STATE_ABBREVIATIONS.test(lowered) || STATE_NAMES.test(lowered);
  const hasZip = ZIP.test(trimmed);
  const hasStreetWord = STREET_WORD.test(lowered);
  return hasNumber && hasState && hasZip && (hasStreetWord || trimmed.length > 25);
}

export function isValidEmail(email: string): boolean {
  return EMAIL.test(email);
}

export function isValidPhone(phone: string): boolean {
  const digits = phone.replace(/\D/g, "").length;
  return digits === 10 || digits === 11;
}

export function emailMatchesWebsite(email: string, website: string): boolean {
  try {
    return emailDomainOf(email) === stripWww(hostnameOf(website));
  } catch {
    return false;
  }
}

/** Validates only the fields that were supplied. */
export function validateSubmissionFields(input: FieldValidationInput): FieldValidationResult {
  const result: FieldValidationResult = {};
  if (input.companyEin) result.einValid = isValidEin(input.companyEin);
  if (input.streetAddress) result.addressValid = isValidAddress(input.streetAddress);
  if (input.supportEmail) {
    result.emailValid = isValidEmail(input.supportEmail);
    result.emailDomainMatch = emailMatchesWebsite(input.supportEmail, input.brandWebsite ?? "");
  }
  if (input.supportPhone) result.phoneValid = isValidPhone(input.supportPhone);
  return result;
}
