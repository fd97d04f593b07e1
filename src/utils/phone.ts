export const DEFAULT_COUNTRY_CODE = '1';

/**
 * Normalize a handle to E.164 where possible.
 *
 *   "5551234567"        -> "+15551234567"
 *   "+1 (555) 123-4567" -> "+15551234567"
 *   "user@icloud.com"   -> "user@icloud.com"
 *
 * Short or otherwise ambiguous numbers come back unchanged.
 */
export function normalizePhone(identifier: string, countryCode: string = DEFAULT_COUNTRY_CODE): string {
    if (identifier.includes('@')) {
        return identifier;
    }

    const digits = identifier.replace(/\D/g, '');

    if (digits.length === 10) {
        return `+${countryCode}${digits}`;
    }
    if (digits.length === 11 && digits.startsWith(countryCode)) {
        return `+${digits}`;
    }
    if (digits.length > 11) {
        return `+${digits}`;
    }

    return identifier;
}

/**
 * Equivalence forms used when comparing a tracked recipient with a store handle:
 * the normalized form, its digits, and its digits without the country code.
 */
export function phoneMatchForms(identifier: string, countryCode: string = DEFAULT_COUNTRY_CODE): Set<string> {
    const normalized = normalizePhone(identifier.trim(), countryCode);
    const forms = new Set<string>();
    if (normalized) forms.add(normalized);

    if (normalized.includes('@')) {
        return forms;
    }

    const digits = normalized.replace(/\D/g, '');
    if (digits) {
        forms.add(digits);
        if (digits.length === 10 + countryCode.length && digits.startsWith(countryCode)) {
            forms.add(digits.slice(countryCode.length));
        }
    }

    return forms;
}

export function phonesMatch(left: string, right: string, countryCode: string = DEFAULT_COUNTRY_CODE): boolean {
    const leftForms = phoneMatchForms(left, countryCode);
    for (const form of phoneMatchForms(right, countryCode)) {
        if (leftForms.has(form)) return true;
    }
    return false;
}
