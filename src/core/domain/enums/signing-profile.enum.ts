/**
 * Canonicalization profiles - how a container becomes a signing string
 */
export enum SigningProfile {
  /**
   * Profile A: sorted `k=v&...` with `&key=SECRET` appended, then digested
   */
  KEYED_DIGEST = 'keyed-digest',

  /**
   * Profile B: sorted `k=v&...`, secret only fed to the MAC
   */
  MAC = 'mac',

  /**
   * Profile C: sorted `k=v&...`, signed with a private key
   */
  ASYMMETRIC = 'asymmetric',
}
