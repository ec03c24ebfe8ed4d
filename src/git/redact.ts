const CREDENTIAL_RE = /(https?:\/\/)([^@/\s]+)@/gi;

/**
 * Hide credentials embedded in HTTP(S) remote URLs anywhere in `text`.
 */
export const redactRepoUrl = (text: string) =>
	text.replace(CREDENTIAL_RE, "$1***@");
