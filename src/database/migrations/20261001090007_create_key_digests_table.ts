import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  return knex.schema.createTable('key_digests', (table) => {
    table.uuid('id').primary();
    table.uuid('device_id').notNullable().references('id').inTable('devices').onDelete('CASCADE');
    table.string('digest', 64).notNullable();
    table.timestamp('created_at', { useTz: true }).notNullable();

    table.unique(['device_id', 'digest']);
  });
}

export async function down(knex: Knex): Promise<void> {
  return knex.schema.dropTableIfExists('key_digests');
}
