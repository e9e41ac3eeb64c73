import "reflect-metadata";
import { afterEach } from "vitest";
import { logger } from "@/infrastructure/utils/logger";
import { RandomUtils } from "@/shared/utils/RandomUtils";

afterEach(() => {
  logger.clear();
  logger.resetMetrics();
  RandomUtils.seed(null);
});
