/** Version stamped on every JSON report produced by this package. */
export const REPORT_SCHEMA_VERSION = '1';
