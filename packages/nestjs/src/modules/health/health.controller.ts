import { Controller, Get } from "@nestjs/common";
import {
  DiskHealthIndicator,
  HealthCheck,
  HealthCheckService,
} from "@nestjs/terminus";

import { SentimentModelHealthIndicator } from "./sentiment-model.health";

@Controller("health")
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private readonly disk: DiskHealthIndicator,
    private readonly sentimentModel: SentimentModelHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () =>
        this.disk.checkStorage("storage", { path: "/", thresholdPercent: 0.9 }),
      () => this.sentimentModel.isHealthy("sentimentModel"),
    ]);
  }
}
