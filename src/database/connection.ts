import Knex, { Knex as KnexType } from 'knex';
import { Model } from 'objection';
import knexConfig from './knexfile';
import { config } from '../config';

const environment = config.server.nodeEnv;
const connectionConfig = knexConfig[environment] || knexConfig.development;

const knex: KnexType = Knex(connectionConfig);

// Every model query goes through this instance unless handed a transaction.
Model.knex(knex);

export async function migrateLatest(): Promise<void> {
  const [batch, applied]: [number, string[]] = await knex.migrate.latest();
  if (applied.length > 0) {
    console.log(`[Database] Batch ${batch}: applied ${applied.length} migration(s)`);
  }
}

export default knex;
