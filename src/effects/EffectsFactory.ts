/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * Wires the real implementations that connect to actual services:
 * - PostgreSQL for carts, catalog, vouchers, orders and the loyalty ledger
 * - PostgreSQL inbox + MailHog SMTP for customer notifications
 * - LocalStack CloudWatch/SNS for side effect failure alerts
 */
import type {
  AppEffects,
  MonitoringService,
  NotificationService,
  UnitOfWork,
} from '../pure/effects';
import type {Clock, CommerceSettings} from '../types';
import type {ProductionConfig} from './types';
import {loadConfigFromEnv} from './config';
import {CloudWatchMonitoringService} from './monitoring';
import {
  CompositeNotificationService,
  NodemailerNotificationService,
  PostgresNotificationInbox,
} from './notifications';
import {PostgresUnitOfWork} from './PostgresUnitOfWork';
import {readFile} from 'node:fs/promises';
import {join} from 'node:path';
import {Pool} from 'pg';

export type ProductionEffects = AppEffects & {
  close(): Promise<void>;
};

const SCHEMA_FILE = join(__dirname, '..', '..', 'db', 'schema.sql');

const systemClock: Clock = {
  now: () => new Date(),
};

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements ProductionEffects {
  private _pool?: Pool;
  private _unitOfWork?: UnitOfWork;
  private _notificationService?: NotificationService;
  private _monitoringService?: CloudWatchMonitoringService;

  readonly clock: Clock = systemClock;

  constructor(private config: ProductionConfig) {}

  get settings(): CommerceSettings {
    return this.config.commerce;
  }

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      const database = this.config.database;
      this._pool = new Pool({
        host: database.host,
        port: database.port,
        user: database.user,
        password: database.password,
        database: database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: database.connectionTimeoutMillis,
        query_timeout: database.queryTimeoutMillis,
        statement_timeout: database.queryTimeoutMillis,
      });

      this._pool.on('error', (err) => console.error('PostgreSQL pool error:', err));

      // Test database connection
      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private requirePool(): Pool {
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get transactions(): UnitOfWork {
    if (!this._unitOfWork) {
      this._unitOfWork = new PostgresUnitOfWork(this.requirePool());
    }
    return this._unitOfWork;
  }

  get notifications(): NotificationService {
    if (!this._notificationService) {
      const pool = this.requirePool();
      const channels: NotificationService[] = [new PostgresNotificationInbox(pool)];
      if (this.config.email.enabled) {
        channels.push(new NodemailerNotificationService(pool, this.config.email));
      }
      this._notificationService = new CompositeNotificationService(channels);
    }
    return this._notificationService;
  }

  get monitoring(): MonitoringService {
    if (!this._monitoringService) {
      this._monitoringService = new CloudWatchMonitoringService(this.config.aws);
    }
    return this._monitoringService;
  }

  private async applySchema(pool: Pool): Promise<void> {
    const schema = await readFile(SCHEMA_FILE, 'utf8');
    await pool.query(schema);
    console.log('✅ Database schema applied');
  }

  /**
   * Initialize the PostgreSQL pool (and the schema when configured).
   * Must be called before using the effects
   */
  async initialize(): Promise<void> {
    const pool = await this.getPool();
    if (this.config.database.applySchema) {
      await this.applySchema(pool);
    }
    console.log('✅ All production effects initialized');
  }

  async close(): Promise<void> {
    this._monitoringService?.destroy();
    if (this._pool) {
      await this._pool.end();
      this._pool = undefined;
      this._unitOfWork = undefined;
      this._notificationService = undefined;
    }
  }

  /**
   * Static factory method to create and initialize production effects
   */
  static async make(config?: ProductionConfig): Promise<ProductionEffects> {
    const cfg = config || loadConfigFromEnv();
    const effects = new EffectsFactory(cfg);
    await effects.initialize();
    return effects;
  }
}

// Export a factory function
export async function makeAppEffects(config?: ProductionConfig): Promise<ProductionEffects> {
  return EffectsFactory.make(config);
}
