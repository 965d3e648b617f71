/**
 * Migration 002 — Create the `enrichment_requests` Table
 * Layer: Infrastructure (Database)
 *
 * The backfill queue. Rows move pending → processing → done | failed and are
 * never deleted by the resolver.
 *
 * The partial unique index is the whole deduplication story: at most one row
 * per normalized name may be active (pending or processing), while any number
 * of finished rows may share it. The resolver's single
 * `INSERT ... ON CONFLICT (normalized_name) WHERE status IN (...) DO NOTHING`
 * relies on this exact predicate.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('enrichment_requests', (table) => {
    table.increments('id').primary();
    table.text('raw_name').notNullable();
    table.text('normalized_name').notNullable();
    table.string('fallback_id', 32).notNullable();
    table.string('status', 16).notNullable().defaultTo('pending');
    table.integer('attempts').notNullable().defaultTo(0);
    table.text('last_error');

    table.timestamps(true, true);

    table.index(['status', 'created_at'], 'idx_enrichment_requests_status_created');
  });

  await knex.raw(`
    ALTER TABLE enrichment_requests
    ADD CONSTRAINT chk_enrichment_requests_status
    CHECK (status IN ('pending', 'processing', 'done', 'failed'))
  `);

  await knex.raw(`
    CREATE UNIQUE INDEX uq_enrichment_requests_active_name
    ON enrichment_requests (normalized_name)
    WHERE status IN ('pending', 'processing')
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.raw('DROP INDEX IF EXISTS uq_enrichment_requests_active_name');
  await knex.schema.dropTableIfExists('enrichment_requests');
}
