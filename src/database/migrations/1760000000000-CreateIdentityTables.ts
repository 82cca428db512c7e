import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

export class CreateIdentityTables1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'roles',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'name',
            type: 'varchar',
            length: '100',
            isNullable: false,
            isUnique: true,
          },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'companies',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'name',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'role_alias',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
          {
            name: 'updated_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'companies',
      new TableIndex({
        name: 'IDX_companies_role_alias',
        columnNames: ['role_alias'],
        isUnique: true,
      }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'users',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'login',
            type: 'varchar',
            length: '64',
            isNullable: false,
          },
          {
            name: 'password',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'enabled',
            type: 'boolean',
            default: true,
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
          {
            name: 'updated_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'users',
      new TableIndex({
        name: 'IDX_users_login',
        columnNames: ['login'],
        isUnique: true,
      }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'users_roles',
        columns: [
          {
            name: 'user_id',
            type: 'integer',
            isPrimary: true,
          },
          {
            name: 'role_id',
            type: 'integer',
            isPrimary: true,
          },
        ],
      }),
      true,
    );

    await queryRunner.createForeignKeys('users_roles', [
      new TableForeignKey({
        columnNames: ['user_id'],
        referencedTableName: 'users',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
      new TableForeignKey({
        columnNames: ['role_id'],
        referencedTableName: 'roles',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
    ]);

    await queryRunner.createTable(
      new Table({
        name: 'acl_object_identities',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'object_type',
            type: 'varchar',
            length: '50',
            isNullable: false,
          },
          {
            name: 'object_id',
            type: 'integer',
            isNullable: false,
          },
          {
            name: 'owner_login',
            type: 'varchar',
            length: '100',
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndices('acl_object_identities', [
      new TableIndex({
        name: 'IDX_acl_object_identities_object',
        columnNames: ['object_type', 'object_id'],
        isUnique: true,
      }),
      new TableIndex({
        name: 'IDX_acl_object_identities_owner_login',
        columnNames: ['owner_login'],
      }),
    ]);

    await queryRunner.createTable(
      new Table({
        name: 'acl_entries',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'object_type',
            type: 'varchar',
            length: '50',
            isNullable: false,
          },
          {
            name: 'object_id',
            type: 'integer',
            isNullable: false,
          },
          {
            name: 'subject_login',
            type: 'varchar',
            length: '100',
            isNullable: false,
          },
          {
            name: 'permission',
            type: 'varchar',
            length: '10',
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.query(`
      ALTER TABLE acl_entries
      ADD CONSTRAINT check_acl_entries_permission
      CHECK (permission IN ('READ', 'WRITE'));
    `);

    await queryRunner.createIndices('acl_entries', [
      new TableIndex({
        name: 'IDX_acl_entries_object_subject_permission',
        columnNames: ['object_type', 'object_id', 'subject_login', 'permission'],
        isUnique: true,
      }),
      new TableIndex({
        name: 'IDX_acl_entries_subject_login',
        columnNames: ['subject_login'],
      }),
    ]);

    // Global administrator role; tenant roles are created by provisioning
    await queryRunner.query(
      `INSERT INTO roles (name) VALUES ('ROLE_ADMIN') ON CONFLICT (name) DO NOTHING`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('acl_entries', true);
    await queryRunner.dropTable('acl_object_identities', true);
    await queryRunner.dropTable('users_roles', true);
    await queryRunner.dropTable('users', true);
    await queryRunner.dropTable('companies', true);
    await queryRunner.dropTable('roles', true);
  }
}
