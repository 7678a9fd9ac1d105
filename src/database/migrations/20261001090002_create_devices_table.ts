import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  return knex.schema.createTable('devices', (table) => {
    table.uuid('id').primary();
    table.uuid('user_id').notNullable().references('id').inTable('users').onDelete('CASCADE');
    // Both keys stay NULL until the owning device uploads them, then never change.
    table.binary('verify_key').nullable();
    table.binary('agreement_key').nullable();
    table.timestamp('last_seen_at', { useTz: true }).notNullable();
    table.timestamp('created_at', { useTz: true }).notNullable();

    table.unique(['verify_key']);
    table.index('user_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  return knex.schema.dropTableIfExists('devices');
}
