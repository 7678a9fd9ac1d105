import type { Knex } from 'knex';
import * as createUsers from './20261001090001_create_users_table';
import * as createDevices from './20261001090002_create_devices_table';
import * as createOneTimeKeys from './20261001090003_create_one_time_keys_table';
import * as createChannels from './20261001090004_create_channels_tables';
import * as createMessages from './20261001090005_create_messages_tables';
import * as createAuth from './20261001090006_create_auth_tables';
import * as createKeyDigests from './20261001090007_create_key_digests_table';

interface Migration {
  name: string;
  module: Knex.Migration;
}

const migrations: Migration[] = [
  { name: '20261001090001_create_users_table', module: createUsers },
  { name: '20261001090002_create_devices_table', module: createDevices },
  { name: '20261001090003_create_one_time_keys_table', module: createOneTimeKeys },
  { name: '20261001090004_create_channels_tables', module: createChannels },
  { name: '20261001090005_create_messages_tables', module: createMessages },
  { name: '20261001090006_create_auth_tables', module: createAuth },
  { name: '20261001090007_create_key_digests_table', module: createKeyDigests },
];

/**
 * Migrations are imported statically so the same list runs from compiled
 * output, under ts-jest, and from the knex CLI.
 */
export const migrationSource: Knex.MigrationSource<Migration> = {
  async getMigrations() {
    return migrations;
  },
  getMigrationName(migration) {
    return migration.name;
  },
  async getMigration(migration) {
    return migration.module;
  },
};
