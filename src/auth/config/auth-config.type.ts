export type AuthConfig = {
  secret?: string;
  // ms-style duration, e.g. "15m" or "1d"
  expires?: string;
  bcryptRounds: number;
  jwtIssuer?: string;
};
