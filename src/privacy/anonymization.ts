export interface ContactFields {
  full_name: string;
  email: string;
  phone: string;
}

const MASK = "***";

/** Returns a masked copy; the input is never modified. */
export function anonymizeCandidate<T extends ContactFields>(candidate: T): T {
  return {
    ...candidate,
    full_name: anonymizeName(candidate.full_name),
    email: anonymizeEmail(candidate.email),
    phone: anonymizePhone(candidate.phone),
  };
}

export function anonymizeName(name: string): string {
  const parts = name.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length === 0) {
    return name;
  }
  if (parts.length === 1) {
    return `${parts[0].charAt(0)}${MASK}`;
  }
  return `${parts[0].charAt(0)}${MASK} ${parts[parts.length - 1].charAt(0)}${MASK}`;
}

export function anonymizeEmail(email: string): string {
  const separatorIndex = email.indexOf("@");
  if (!email || separatorIndex < 0) {
    return email;
  }
  const local = email.slice(0, separatorIndex);
  const domain = email.slice(separatorIndex + 1);
  const maskedLocal = local.length <= 2 ? local : `${local.slice(0, 2)}${MASK}`;
  return `${maskedLocal}@${domain}`;
}

export function anonymizePhone(phone: string): string {
  if (!phone) {
    return phone;
  }
  if (phone.length > 4) {
    return `${MASK}-${MASK}-${phone.slice(-4)}`;
  }
  return `${MASK}-${MASK}-****`;
}
