/** Identity carried by a room join token. */
export interface JoinClaims {
  userId: string;
  name: string;
  roomId: string;
}

/** A verified join token: its claims plus the id and expiry used for single-use checks. */
export interface VerifiedJoinToken extends JoinClaims {
  tokenId: string;
  /** Seconds since the epoch. */
  expiresAt: number;
}
