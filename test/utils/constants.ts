export const TEST_JWT_SECRET = 'test-secret';
export const ADMIN_LOGIN = 'admin';
// satisfies the password policy: 2 upper, 1 special, 2 digits, 3 lower
export const ADMIN_PASSWORD = 'AAdmin1!2xyz';
export const STRONG_PASSWORD = 'Ab1!Ab1!cde';
export const OTHER_STRONG_PASSWORD = 'CCdd2@2eef';
