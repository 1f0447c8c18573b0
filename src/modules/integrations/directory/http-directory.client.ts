/**
 * HttpDirectoryClient: pages through the directory REST gateway.
 *
 * GET {base}/users?page=N&pageSize=M → { users: [...], nextPage: number | null }
 * GET {base}/users/{username}         → user, or 404
 *
 * Paging stops at the configured hard cap even if the gateway reports more.
 */
import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';

import type { UserRecord } from '../../../domain/models/user.model';
import { SYNC_CONFIG, type SyncConfig } from '../../config/sync-config';
import { SyncLogger } from '../../logging/sync-logger.service';
import { LogCategory } from '../../logging/log-levels';
import { HttpStatusError, joinUrl, requestJson } from '../http-json';
import type { IDirectoryClient } from './directory-client.interface';
import { directoryUserSchema, toUserRecord } from './directory-user.mapper';

const pageSchema = z.object({
  users: z.array(directoryUserSchema),
  nextPage: z.number().int().nullish(),
});

@Injectable()
export class HttpDirectoryClient implements IDirectoryClient {
  private readonly settings: SyncConfig['directory'];

  constructor(
    @Inject(SYNC_CONFIG) config: SyncConfig,
    private readonly logger: SyncLogger,
  ) {
    this.settings = config.directory;
  }

  async fetchAllUsers(): Promise<UserRecord[]> {
    const { baseUrl, pageSize, maxUsers, timeoutMs } = this.settings;
    const users: UserRecord[] = [];
    let page: number | null = 1;

    while (page !== null && users.length < maxUsers) {
      const url = joinUrl(baseUrl, `users?page=${page}&pageSize=${pageSize}`);
      const body = await requestJson(url, pageSchema, { timeoutMs });
      users.push(...body.users.map(toUserRecord));
      this.logger.debug(LogCategory.DIRECTORY, 'Fetched directory page', { page, received: body.users.length });
      page = body.users.length === 0 ? null : body.nextPage ?? null;
    }

    if (users.length > maxUsers) {
      this.logger.warn(LogCategory.DIRECTORY, 'Directory result truncated at hard cap', { maxUsers });
      users.length = maxUsers;
    }
    this.logger.info(LogCategory.DIRECTORY, 'Fetched all directory users', { count: users.length });
    return users;
  }

  async fetchUserByUsername(username: string): Promise<UserRecord | null> {
    const url = joinUrl(this.settings.baseUrl, `users/${encodeURIComponent(username)}`);
    try {
      return toUserRecord(await requestJson(url, directoryUserSchema, { timeoutMs: this.settings.timeoutMs }));
    } catch (err) {
      if (err instanceof HttpStatusError && err.status === 404) {
        return null;
      }
      throw err;
    }
  }
}
