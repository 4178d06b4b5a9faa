import { EmptyResultError } from 'sequelize';
import type { Model, ModelStatic } from 'sequelize';

import { ObjectLoadError, RecordNotFoundError } from '../objects/errors.js';
import type { Finder, RecordId } from '../objects/types.js';

export type SequelizeModels = Record<string, ModelStatic<Model>>;

/**
 * Default finder over Sequelize models keyed by domain type (the ORM's model keys).
 */
export class SequelizeFinder implements Finder {
  constructor(private readonly models: SequelizeModels) {}

  async find(domainType: string, id: RecordId): Promise<Model> {
    if (!Object.prototype.hasOwnProperty.call(this.models, domainType)) {
      throw new ObjectLoadError(`Unknown model: ${domainType}`, { domainType });
    }
    const model = this.models[domainType];

    let row: Model | null;
    try {
      row = await model.findByPk(id);
    } catch (e) {
      if (e instanceof EmptyResultError) throw new RecordNotFoundError(domainType, id);
      throw e;
    }
    if (!row) throw new RecordNotFoundError(domainType, id);
    return row;
  }
}
