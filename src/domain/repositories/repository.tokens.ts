/**
 * NestJS injection tokens for persistence ports.
 *
 * Usage:
 *   @Inject(STATE_STORE) private readonly store: IStateStore
 */
export const STATE_STORE = 'STATE_STORE';
