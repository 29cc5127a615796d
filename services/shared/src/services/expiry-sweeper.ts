import { InventoryConfig } from '../config';
import { createChildLogger } from '../utils/logger';
import { InventoryEngine } from './inventory-engine';

const logger = createChildLogger({ component: 'expiry-sweeper' });

export type SweeperConfig = Pick<InventoryConfig, 'sweepIntervalMs' | 'sweepBatchSize' | 'purgeAfterHours'>;

export interface SweepReport {
     scanned: number;
     expired: number;
     /** Reservations that left PENDING between the scan and their own transaction. */
     skipped: number;
     failed: number;
}

/**
 * Drives timed-out PENDING reservations through the engine's expiry path.
 * Safe to run from several processes at once: a reservation is only released
 * by whichever sweeper wins its PENDING to EXPIRED transition.
 */
export class ExpirySweeper {
     private running = false;
     private loop: Promise<void> | null = null;
     private wake: (() => void) | null = null;
     private timer: NodeJS.Timeout | null = null;

     constructor(
          private readonly engine: InventoryEngine,
          private readonly config: SweeperConfig
     ) {}

     async sweep(): Promise<SweepReport> {
          const candidates = await this.engine.findExpiredReservations(this.config.sweepBatchSize);
          const report: SweepReport = { scanned: candidates.length, expired: 0, skipped: 0, failed: 0 };

          for (const reservation of candidates) {
               try {
                    const expired = await this.engine.expireReservation(reservation.id, {
                         actor: 'expiry-sweeper',
                    });
                    if (expired) {
                         report.expired++;
                    } else {
                         report.skipped++;
                    }
               } catch (error) {
                    report.failed++;
                    logger.error(
                         { error, reservationId: reservation.id, orderId: reservation.orderId },
                         'Failed to expire reservation'
                    );
               }
          }

          if (report.scanned > 0) {
               logger.info(report, 'Expiry sweep completed');
          }
          return report;
     }

     async purge(): Promise<number> {
          return this.engine.purgeTerminalReservations(this.config.purgeAfterHours);
     }

     async runOnce(): Promise<{ sweep: SweepReport; purged: number }> {
          const sweep = await this.sweep();
          const purged = await this.purge();
          return { sweep, purged };
     }

     start(): void {
          if (this.running) {
               return;
          }
          this.running = true;

          logger.info(
               {
                    intervalMs: this.config.sweepIntervalMs,
                    batchSize: this.config.sweepBatchSize,
                    purgeAfterHours: this.config.purgeAfterHours,
               },
               'Starting expiry sweeper'
          );

          this.loop = this.runLoop();
     }

     /** Resolves once the current pass has finished and the loop has exited. */
     async stop(): Promise<void> {
          if (!this.running) {
               return;
          }

          logger.info('Stopping expiry sweeper');
          this.running = false;
          this.wake?.();

          const loop = this.loop;
          this.loop = null;
          if (loop) {
               await loop;
          }
     }

     isRunning(): boolean {
          return this.running;
     }

     private async runLoop(): Promise<void> {
          while (this.running) {
               try {
                    await this.runOnce();
               } catch (error) {
                    logger.error({ error }, 'Error running expiry sweep');
               }

               if (this.running) {
                    await this.sleep(this.config.sweepIntervalMs);
               }
          }
          logger.info('Expiry sweeper stopped');
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => {
               const done = () => {
                    if (this.timer) {
                         clearTimeout(this.timer);
                    }
                    this.timer = null;
                    this.wake = null;
                    resolve();
               };
               this.wake = done;
               this.timer = setTimeout(done, ms);
          });
     }
}
