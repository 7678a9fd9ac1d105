import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // Message ids are client-generated UUIDv7 values and double as the history cursor.
  await knex.schema.createTable('messages', (table) => {
    table.uuid('id').primary();
    table.uuid('channel_id').notNullable().references('id').inTable('channels').onDelete('CASCADE');
    table.uuid('sender_id').notNullable().references('id').inTable('users').onDelete('CASCADE');
    table
      .uuid('sender_device_id')
      .notNullable()
      .references('id')
      .inTable('devices')
      .onDelete('CASCADE');
    table.timestamp('created_at', { useTz: true }).notNullable();

    table.index(['channel_id', 'id']);
  });

  await knex.schema.createTable('message_payloads', (table) => {
    table.uuid('message_id').notNullable().references('id').inTable('messages').onDelete('CASCADE');
    table
      .uuid('recipient_device_id')
      .notNullable()
      .references('id')
      .inTable('devices')
      .onDelete('CASCADE');
    table.binary('ciphertext').notNullable();
    table.boolean('is_pre_key').notNullable().defaultTo(false);

    table.primary(['message_id', 'recipient_device_id']);
    table.index('recipient_device_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('message_payloads');
  await knex.schema.dropTableIfExists('messages');
}
