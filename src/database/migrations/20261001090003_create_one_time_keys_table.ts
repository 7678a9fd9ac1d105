import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  return knex.schema.createTable('one_time_keys', (table) => {
    table.uuid('id').primary();
    table.uuid('device_id').notNullable().references('id').inTable('devices').onDelete('CASCADE');
    table.binary('public_key').notNullable();
    table.timestamp('created_at', { useTz: true }).notNullable();

    table.unique(['device_id', 'public_key']);
    table.index('device_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  return knex.schema.dropTableIfExists('one_time_keys');
}
