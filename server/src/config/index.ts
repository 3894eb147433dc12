/**
 * Centralized Configuration
 *
 * STRUCTURE:
 * - /sync/erp.ts - ERP endpoints, paging, status codes, inbox constants
 * - /env.ts      - validated environment variables
 *
 * TO ADD A NEW CONFIGURATION:
 * 1. Define it in the matching file with a short description
 * 2. Re-export it from this file
 */

export {
    ERP_DEFAULT_BASE_URL,
    ERP_MANUFACTURING_ORDERS_PATH,
    ERP_PAGE_SIZE,
    ERP_MAX_PAGES,
    ERP_API_TIMEOUT_MS,
    ERP_STATUS_CODES,
    ERP_STATUS_VALUES,
    INBOX_ONCE_BATCH_SIZE,
    INBOX_FAILURE_REASON_MAX_LENGTH,
    INBOX_STARTUP_DELAY_MS,
} from './sync/erp.js';

export { getEnv, parseEnv, formatEnvIssues, type Env } from './env.js';
