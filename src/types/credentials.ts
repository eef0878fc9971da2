export interface SiteCredentials {
  username: string;
  password: string;
}

export interface CredentialBundle {
  sites: Record<string, SiteCredentials>;
  notificationAddress: string;
}

/** Credentials as supplied, before the completeness check against enabled sites. */
export interface RawCredentials {
  sites: Record<string, { username?: string; password?: string }>;
  notificationAddress?: string;
}
