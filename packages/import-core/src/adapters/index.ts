import type { ImportFormat } from '../types';
import { CsvAdapter } from './csvAdapter';
import { JsonInfluxAdapter } from './jsonInfluxAdapter';
import { JsonPromAdapter } from './jsonPromAdapter';
import { LineProtocolAdapter } from './lineProtocolAdapter';
import type { AdapterSettings, FormatAdapter } from './types';

export { CsvAdapter } from './csvAdapter';
export { JsonInfluxAdapter } from './jsonInfluxAdapter';
export { JsonPromAdapter } from './jsonPromAdapter';
export { LineProtocolAdapter } from './lineProtocolAdapter';
export { readJsonUnits, type JsonUnit } from './jsonDocument';
export type { AdapterSettings, FormatAdapter } from './types';

export function createFormatAdapter(format: ImportFormat, settings: AdapterSettings): FormatAdapter<unknown> {
  switch (format) {
    case 'line_protocol':
      return new LineProtocolAdapter(settings);
    case 'csv':
      return new CsvAdapter(settings);
    case 'jsoni':
      return new JsonInfluxAdapter(settings);
    case 'jsonp':
      return new JsonPromAdapter(settings);
  }
}
