export const DEFAULT_RETENTION_POLICY = 'autogen';
export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_MAX_FLUSH_ATTEMPTS = 3;
export const DEFAULT_TIME_FIELD = 'time';
export const DEFAULT_PROM_FIELD = 'value';

export const DIRECTIVE_DDL = '# DDL';
export const DIRECTIVE_DML = '# DML';
export const DIRECTIVE_DATABASE = '# CONTEXT-DATABASE:';
export const DIRECTIVE_RETENTION_POLICY = '# CONTEXT-RETENTION-POLICY:';

export const INFLUX_SERIES_KEY = 'series';
export const PROM_RESULT_KEY = 'result';
