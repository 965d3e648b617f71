/**
 * Migration 001 — Create the `company_mappings` Table
 * Layer: Infrastructure (Database)
 *
 * The persistent normalized-name → company-ID cache. One row per normalized
 * name; `normalized_name` is the primary key, which is also the conflict
 * target for the write-through upsert.
 *
 *   - `source_tier` says where the mapping came from (override / backflow /
 *     external); `tier_priority` is its numeric rank, stored so the upsert can
 *     compare ranks in SQL (`WHERE company_mappings.tier_priority <=
 *     excluded.tier_priority`).
 *   - `confidence` is informational.
 *   - The `source_tier` index serves the admin operations that delete or purge
 *     one tier.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('company_mappings', (table) => {
    table.text('normalized_name').primary();
    table.string('company_id', 64).notNullable();
    table.string('source_tier', 16).notNullable();
    table.smallint('tier_priority').notNullable();
    table.decimal('confidence', 4, 3).notNullable().defaultTo(1);

    table.timestamps(true, true);

    table.index('source_tier', 'idx_company_mappings_source_tier');
  });

  await knex.raw(`
    ALTER TABLE company_mappings
    ADD CONSTRAINT chk_company_mappings_source_tier
    CHECK (source_tier IN ('override', 'backflow', 'external'))
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('company_mappings');
}
