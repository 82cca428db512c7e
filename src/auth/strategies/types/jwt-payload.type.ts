export type JwtPayloadType = {
  // user login
  sub: string;
  iss?: string;
  iat?: number;
  exp?: number;
};
