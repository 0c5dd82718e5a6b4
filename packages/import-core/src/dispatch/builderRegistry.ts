import type { WriteTarget } from '../types';
import { WriteRequestBuilder } from './writeRequest';

/** Request builders of one import run, keyed `<database>.<retentionPolicy>`. */
export class WriteRequestBuilderRegistry {
  private readonly builders = new Map<string, WriteRequestBuilder>();

  static keyOf(target: WriteTarget): string {
    return `${target.database}.${target.retentionPolicy}`;
  }

  get(target: WriteTarget): WriteRequestBuilder {
    const key = WriteRequestBuilderRegistry.keyOf(target);
    let builder = this.builders.get(key);
    if (!builder) {
      builder = new WriteRequestBuilder(target.database, target.retentionPolicy);
      this.builders.set(key, builder);
    }
    return builder;
  }

  get size(): number {
    return this.builders.size;
  }
}
