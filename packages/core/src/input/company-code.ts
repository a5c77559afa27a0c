import { COMPANY_CODE_MESSAGE_PATTERN } from '../types/index.js';

/**
 * Extracts the company code from a request message body
 * ("Company code: 0075", case-insensitive).
 *
 * @returns The four-digit code, or null if the body names none
 */
export function extractCompanyCode(body: string): string | null {
    const match = COMPANY_CODE_MESSAGE_PATTERN.exec(body);
    return match?.groups?.code ?? null;
}
