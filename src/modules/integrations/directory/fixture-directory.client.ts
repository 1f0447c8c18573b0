/**
 * FixtureDirectoryClient: serves users from `<FIXTURE_PATH>/directory-users.json`.
 * Used for local runs and end-to-end tests.
 */
import { Inject, Injectable } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import type { UserRecord } from '../../../domain/models/user.model';
import { SYNC_CONFIG, type SyncConfig } from '../../config/sync-config';
import type { IDirectoryClient } from './directory-client.interface';
import { directoryUserSchema, toUserRecord } from './directory-user.mapper';

export const DIRECTORY_FIXTURE_FILE = 'directory-users.json';

@Injectable()
export class FixtureDirectoryClient implements IDirectoryClient {
  private cache?: Promise<UserRecord[]>;

  constructor(@Inject(SYNC_CONFIG) private readonly config: Pick<SyncConfig, 'fixturePath'>) {}

  async fetchAllUsers(): Promise<UserRecord[]> {
    this.cache ??= this.load().catch((err: unknown) => {
      this.cache = undefined;
      throw err;
    });
    return (await this.cache).map((u) => ({ ...u }));
  }

  async fetchUserByUsername(username: string): Promise<UserRecord | null> {
    const users = await this.fetchAllUsers();
    return users.find((u) => u.username === username) ?? null;
  }

  private async load(): Promise<UserRecord[]> {
    const raw = await readFile(join(this.config.fixturePath, DIRECTORY_FIXTURE_FILE), 'utf-8');
    return z.array(directoryUserSchema).parse(JSON.parse(raw)).map(toUserRecord);
  }
}
