import authConfig from './auth.config';

describe('authConfig', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    process.env.AUTH_JWT_SECRET = 'test-secret';
    process.env.AUTH_JWT_TOKEN_EXPIRES_IN = '15m';
    delete process.env.AUTH_BCRYPT_ROUNDS;
    delete process.env.AUTH_JWT_ISSUER;
  });

  afterEach(() => {
    process.env = { ...saved };
  });

  it('reads a valid environment', () => {
    expect(authConfig()).toEqual({
      secret: 'test-secret',
      expires: '15m',
      bcryptRounds: 10,
      jwtIssuer: undefined,
    });
  });

  it.each(['soon', '0', '-1h'])(
    'refuses to start with a token lifetime of "%s"',
    (expiresIn) => {
      process.env.AUTH_JWT_TOKEN_EXPIRES_IN = expiresIn;

      expect(() => authConfig()).toThrow('AUTH_JWT_TOKEN_EXPIRES_IN');
    },
  );
});
