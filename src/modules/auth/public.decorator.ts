import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/** Exempt a route or controller from the shared-secret check. */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
