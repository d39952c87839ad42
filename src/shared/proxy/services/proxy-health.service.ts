import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { errorMessage } from '@/shared/lib/util';
import { ProxyPoolService } from './proxy-pool.service';
import { ProxyRegistryService } from './proxy-registry.service';

export const PROXY_HEALTH_INTERVAL = 'proxy-health-check';

@Injectable()
export class ProxyHealthService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(ProxyHealthService.name);

  constructor(
    private readonly pool: ProxyPoolService,
    private readonly registry: ProxyRegistryService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onApplicationBootstrap(): void {
    const minutes = this.registry.getPolicy().checkIntervalMinutes;
    const interval = setInterval(() => {
      this.performHealthCheck().catch((error: unknown) =>
        this.logger.error(`Proxy health check failed: ${errorMessage(error)}`),
      );
    }, minutes * 60_000);
    interval.unref();

    this.schedulerRegistry.addInterval(PROXY_HEALTH_INTERVAL, interval);
    this.logger.log(`Proxy health check every ${minutes} min`);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', PROXY_HEALTH_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(PROXY_HEALTH_INTERVAL);
    }
  }

  async performHealthCheck(): Promise<void> {
    this.logger.debug('Performing proxy pool health check...');

    const released = await this.pool.sweepCooldowns();
    const stats = this.pool.getStats();

    this.logger.log(
      `Proxy pool health: ${stats.available} available, ${stats.coolingDown} cooling down (${stats.total} total), ${released.length} released`,
    );
  }
}
