import test from "node:test";
import assert from "node:assert/strict";
import {
  emailMatchesWebsite,
  isValidAddress,
  isValidEin,
  isValidEmail,
  isValidPhone,
  validateSubmissionFields
} from "../src/services/submissionValidation.js";

test("EIN needs exactly nine digits", () => {
  assert.equal(isValidEin("12-3456789"), true);
  assert.equal(isValidEin("123"), false);
});

test("address needs number, state and zip", () => {
  assert.equal(isValidAddress("123 Main Street, Springfield, IL 62704"), true);
  assert.equal(isValidAddress("Main Street"), false);
  assert.equal(isValidAddress("123 Main Street, Springfield 62704"), false);
});

test("email and phone formats", () => {
  assert.equal(isValidEmail("help@example.com"), true);
  assert.equal(isValidEmail("bad@"), false);
  assert.equal(isValidPhone("(555) 123-4567"), true);
  assert.equal(isValidPhone("+1 555 123 4567"), true);
  assert.equal(isValidPhone("12345"), false);
});

test("email domain match ignores www and fails closed on bad input", () => {
  assert.equal(emailMatchesWebsite("help@example.com", "https://www.example.com"), true);
  assert.equal(emailMatchesWebsite("help@example.com", ""), false);
  assert.equal(emailMatchesWebsite("nobody", "https://example.com"), false);
});

test("validateSubmissionFields only reports supplied fields", () => {
  assert.deepEqual(validateSubmissionFields({ supportEmail: "help@x.com" }), {
    emailValid: true,
    emailDomainMatch: false
  });
  assert.deepEqual(validateSubmissionFields({}), {});
});
