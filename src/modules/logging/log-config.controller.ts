import { BadRequestException, Body, Controller, Get, Param, Put } from '@nestjs/common';
import { z } from 'zod';

import { SyncLogger } from './sync-logger.service';
import {
  LogLevel,
  LogCategory,
  isLogCategory,
  logLevelName,
  parseLogLevel,
  type LogConfig,
} from './log-levels';

const logConfigUpdateSchema = z.object({
  globalLevel: z.string().optional(),
  includeStackTraces: z.boolean().optional(),
  maxPayloadSizeBytes: z.number().int().positive().optional(),
  format: z.enum(['json', 'pretty']).optional(),
  categoryLevels: z.record(z.string()).optional(),
});

/**
 * Runtime log management without a restart.
 *
 * Routes: /api/admin/log-config/*
 */
@Controller('admin/log-config')
export class LogConfigController {
  constructor(private readonly logger: SyncLogger) {}

  @Get()
  getConfig() {
    const config = this.logger.getConfig();
    const categoryLevels: Record<string, string> = {};
    for (const category of Object.values(LogCategory)) {
      const level = config.categoryLevels[category];
      if (level !== undefined) categoryLevels[category] = logLevelName(level);
    }
    return {
      globalLevel: logLevelName(config.globalLevel),
      categoryLevels,
      includeStackTraces: config.includeStackTraces,
      maxPayloadSizeBytes: config.maxPayloadSizeBytes,
      format: config.format,
      availableLevels: Object.keys(LogLevel).filter((k) => isNaN(Number(k))),
      availableCategories: Object.values(LogCategory),
    };
  }

  /** Partial update; unknown categories are ignored. */
  @Put()
  updateConfig(@Body() body: unknown) {
    const parsed = logConfigUpdateSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    const { globalLevel, categoryLevels, ...rest } = parsed.data;
    const updates: Partial<LogConfig> = { ...rest };

    if (globalLevel !== undefined) {
      updates.globalLevel = parseLogLevel(globalLevel);
    }
    if (categoryLevels !== undefined) {
      const merged = { ...this.logger.getConfig().categoryLevels };
      for (const [category, level] of Object.entries(categoryLevels)) {
        if (isLogCategory(category)) merged[category] = parseLogLevel(level);
      }
      updates.categoryLevels = merged;
    }

    this.logger.updateConfig(updates);
    return { message: 'Log configuration updated', config: this.getConfig() };
  }

  @Put('level/:level')
  setGlobalLevel(@Param('level') level: string) {
    this.logger.setGlobalLevel(level);
    return {
      message: `Global log level set to ${level.toUpperCase()}`,
      globalLevel: logLevelName(this.logger.getConfig().globalLevel),
    };
  }

  @Put('category/:category/:level')
  setCategoryLevel(@Param('category') category: string, @Param('level') level: string) {
    if (!isLogCategory(category)) {
      throw new BadRequestException(`Unknown category '${category}'`);
    }
    this.logger.setCategoryLevel(category, level);
    return {
      message: `Category '${category}' log level set to ${level.toUpperCase()}`,
    };
  }
}
