// src/validator.ts
import * as punycode from "punycode";

export type EmailCheck =
  | { ok: true; normalized: string }
  | { ok: false; reason: string };

const MAX_ADDRESS = 254;
const MAX_LOCAL = 64;
const MAX_DOMAIN = 253;
const MAX_LABEL = 63;

// dot-atom text: RFC 5322 atext plus Unicode letters/digits (RFC 6531)
const ATOM = /^[\p{L}\p{N}\p{M}!#$%&'*+/=?^_`{|}~-]+$/u;
const LABEL = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

function toAsciiDomain(domain: string): string | null {
  try {
    return punycode.toASCII(domain.toLowerCase());
  } catch {
    return null;
  }
}

function checkLocal(local: string): string | null {
  if (!local) return "There must be something before the @-sign.";
  if (local.length > MAX_LOCAL) return `The email address is too long before the @-sign (${local.length - MAX_LOCAL} characters too many).`;
  if (local.startsWith(".")) return "The email address cannot start with a period.";
  if (local.endsWith(".")) return "An email address cannot have a period immediately before the @-sign.";
  if (local.includes("..")) return "An email address cannot have two periods in a row.";
  for (const atom of local.split(".")) {
    if (!ATOM.test(atom)) return "The email address contains invalid characters before the @-sign.";
  }
  return null;
}

function checkDomain(domain: string): string | null {
  if (!domain) return "There must be something after the @-sign.";
  if (domain.startsWith(".")) return "An email address cannot have a period immediately after the @-sign.";
  if (domain.endsWith(".")) return "An email address cannot end with a period.";
  if (domain.includes("..")) return "An email address cannot have two periods in a row.";

  const ascii = toAsciiDomain(domain);
  if (ascii === null) return "The domain name contains invalid characters.";
  if (ascii.length > MAX_DOMAIN) return "The email address is too long after the @-sign.";

  const labels = ascii.split(".");
  if (labels.length < 2) return "The part after the @-sign is not valid. It should have a period.";
  for (const label of labels) {
    if (label.length > MAX_LABEL) return "The email address is too long after the @-sign.";
    if (!LABEL.test(label)) {
      return label.startsWith("-") || label.endsWith("-")
        ? "An email address cannot have a hyphen immediately before or after a period."
        : "The part after the @-sign contains invalid characters.";
    }
  }
  if (/^\d+$/.test(labels[labels.length - 1])) return "The part after the @-sign is not valid. It is not within a valid top-level domain.";
  return null;
}

/**
 * Syntax-only address check (no DNS lookups). The normalized form is the
 * lower-cased address, so validating a normalized address returns it unchanged.
 */
export function validateEmail(raw: string): EmailCheck {
  const email = raw.trim();
  if (!email) return { ok: false, reason: "The email address is empty." };

  const at = email.split("@");
  if (at.length !== 2) return { ok: false, reason: "The email address is not valid. It must have exactly one @-sign." };
  if (/\s/.test(email)) return { ok: false, reason: "The email address contains whitespace." };

  const [local, domain] = at;
  const reason = checkLocal(local) ?? checkDomain(domain);
  if (reason) return { ok: false, reason };

  if (email.length > MAX_ADDRESS) {
    return { ok: false, reason: `The email address is too long (${email.length - MAX_ADDRESS} characters too many).` };
  }
  return { ok: true, normalized: email.toLowerCase() };
}
