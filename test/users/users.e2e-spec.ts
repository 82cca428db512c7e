import request from 'supertest';
import { INestApplication } from '@nestjs/common';
import { createTestApp, getToken } from '../utils/test-helpers';
import {
  ADMIN_LOGIN,
  ADMIN_PASSWORD,
  OTHER_STRONG_PASSWORD,
  STRONG_PASSWORD,
} from '../utils/constants';

describe('Users (E2E)', () => {
  let app: INestApplication;
  let adminToken: string;
  let aliceToken: string;

  beforeAll(async () => {
    ({ app } = await createTestApp());
    adminToken = await getToken(app, ADMIN_LOGIN, ADMIN_PASSWORD);

    await request(app.getHttpServer())
      .post('/api/v1/companies')
      .auth(adminToken, { type: 'bearer' })
      .send({ name: 'Acme', roleAlias: 'ACME' })
      .expect(201);
    await request(app.getHttpServer())
      .post('/api/v1/companies')
      .auth(adminToken, { type: 'bearer' })
      .send({ name: 'Globex', roleAlias: 'GLOBEX' })
      .expect(201);
  });

  afterAll(async () => {
    await app.close();
  });

  it('POST /api/v1/users creates a user owned by the admin', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/v1/users')
      .auth(adminToken, { type: 'bearer' })
      .send({
        login: 'alice',
        password: STRONG_PASSWORD,
        roles: ['ROLE_ACME_LOCAL_ADMIN'],
      })
      .expect(201);

    expect(response.body).toMatchObject({
      id: 2,
      login: 'alice',
      enabled: true,
      roles: ['ROLE_ACME_LOCAL_ADMIN'],
      owner: 'admin',
      acls: ['READ', 'WRITE'],
    });
    expect(response.body.password).toBeUndefined();

    aliceToken = await getToken(app, 'alice', STRONG_PASSWORD);
  });

  it('answers 422 for a weak password', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/v1/users')
      .auth(adminToken, { type: 'bearer' })
      .send({ login: 'weak', password: 'password', roles: ['ROLE_ACME_LOCAL_USER'] })
      .expect(422);

    expect(response.body.errors).toEqual({ password: 'weakPassword' });
  });

  it('answers 403 when ROLE_ADMIN is requested', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/v1/users')
      .auth(adminToken, { type: 'bearer' })
      .send({ login: 'root2', password: STRONG_PASSWORD, roles: ['ROLE_ADMIN'] })
      .expect(403);

    expect(response.body.message).toBe('User can not create new user with ROLE_ADMIN');
  });

  it('keeps a local admin away from its own LOCAL_USER role', async () => {
    await request(app.getHttpServer())
      .post('/api/v1/users')
      .auth(aliceToken, { type: 'bearer' })
      .send({ login: 'bob', password: STRONG_PASSWORD, roles: ['ROLE_ACME_LOCAL_USER'] })
      .expect(403);
  });

  it('lets a local admin create a user it then owns', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/v1/users')
      .auth(aliceToken, { type: 'bearer' })
      .send({
        login: 'gina',
        password: STRONG_PASSWORD,
        roles: ['ROLE_GLOBEX_LOCAL_USER'],
      })
      .expect(201);

    expect(response.body).toMatchObject({ id: 3, owner: 'alice' });
  });

  it('GET /api/v1/users lists only readable users', async () => {
    const asAlice = await request(app.getHttpServer())
      .get('/api/v1/users')
      .auth(aliceToken, { type: 'bearer' })
      .expect(200);
    expect(asAlice.body.map((user: { login: string }) => user.login)).toEqual([
      'alice',
      'gina',
    ]);

    const asAdmin = await request(app.getHttpServer())
      .get('/api/v1/users')
      .auth(adminToken, { type: 'bearer' })
      .expect(200);
    expect(asAdmin.body).toHaveLength(3);
  });

  it('GET /api/v1/users/:id hides users without a READ grant', async () => {
    const ginaToken = await getToken(app, 'gina', STRONG_PASSWORD);

    await request(app.getHttpServer())
      .get('/api/v1/users/2')
      .auth(ginaToken, { type: 'bearer' })
      .expect(404);
  });

  it('GET /api/v1/users/me returns the caller', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/v1/users/me')
      .auth(aliceToken, { type: 'bearer' })
      .expect(200);

    expect(response.body).toMatchObject({ login: 'alice', owner: 'admin' });
  });

  it('PATCH /api/v1/users/:id changes the password', async () => {
    await request(app.getHttpServer())
      .patch('/api/v1/users/3')
      .auth(aliceToken, { type: 'bearer' })
      .send({ password: OTHER_STRONG_PASSWORD })
      .expect(200);

    await getToken(app, 'gina', OTHER_STRONG_PASSWORD);
  });

  it('never disables or deletes an admin', async () => {
    await request(app.getHttpServer())
      .post('/api/v1/users/1/disable')
      .auth(adminToken, { type: 'bearer' })
      .expect(403);
    await request(app.getHttpServer())
      .delete('/api/v1/users/1')
      .auth(adminToken, { type: 'bearer' })
      .expect(403);
  });

  it('a disabled user loses access with a token already issued', async () => {
    const ginaToken = await getToken(app, 'gina', OTHER_STRONG_PASSWORD);

    await request(app.getHttpServer())
      .post('/api/v1/users/3/disable')
      .auth(aliceToken, { type: 'bearer' })
      .expect(204);

    await request(app.getHttpServer())
      .get('/api/v1/users/me')
      .auth(ginaToken, { type: 'bearer' })
      .expect(401);

    const login = await request(app.getHttpServer())
      .post('/api/v1/auth/token')
      .send({ login: 'gina', password: OTHER_STRONG_PASSWORD })
      .expect(422);
    expect(login.body.errors).toEqual({ login: 'userDisabled' });
  });

  it('DELETE /api/v1/users/:id removes the user', async () => {
    await request(app.getHttpServer())
      .delete('/api/v1/users/3')
      .auth(aliceToken, { type: 'bearer' })
      .expect(204);

    await request(app.getHttpServer())
      .get('/api/v1/users/3')
      .auth(adminToken, { type: 'bearer' })
      .expect(404);
  });
});
