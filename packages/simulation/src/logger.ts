/**
 * Simulation Package Logger
 */

import { createPackageLogger } from '@barreplay/utils';

export const logger = createPackageLogger('@barreplay/simulation');
