/**
 * Validates domain format using basic domain regex.
 *
 * Checks if a domain follows basic DNS naming rules.
 * Allows subdomains and TLDs with 2+ characters.
 *
 * @param domain - Domain name to validate
 * @returns True if domain format is valid
 */
export function isValidDomain(domain: string): boolean {
  // Matches: example.com, www.example.com, sub.domain.example.org
  return /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/.test(domain);
}

/**
 * Loose email check for the ACME contact address; the issuance client
 * performs its own validation.
 */
export function isValidEmail(email: string): boolean {
  return /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(email);
}
