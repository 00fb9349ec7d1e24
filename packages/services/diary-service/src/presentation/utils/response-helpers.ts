/**
 * Standardized Response Helpers for diary-service
 */

import { createResponseHelpers } from '@diary/platform-core';
import { SERVICE_NAME } from '../../config/service-config';

const helpers = createResponseHelpers(SERVICE_NAME);

export const { sendSuccess, sendCreated, ServiceErrors } = helpers;
