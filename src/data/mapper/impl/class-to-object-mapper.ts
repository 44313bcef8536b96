// SPDX-License-Identifier: Apache-2.0

import {type ObjectMapper} from '../api/object-mapper.js';
import {type ClassConstructor, instanceToPlain, plainToInstance} from 'class-transformer';
import {ObjectMappingError} from '../api/object-mapping-error.js';
import {injectable} from 'tsyringe-neo';

@injectable()
export class ClassToObjectMapper implements ObjectMapper {
  public fromObject<T>(cls: ClassConstructor<T>, object: object): T {
    if (Array.isArray(object)) {
      throw new ObjectMappingError(`Expected an object but got an array [ cls = '${cls.name}' ]`);
    }

    try {
      // absent keys keep the defaults assigned by the constructor
      return plainToInstance(cls, object, {exposeUnsetFields: false});
    } catch (error) {
      throw new ObjectMappingError(`Error converting object to class instance [ cls = '${cls.name}' ]`, error);
    }
  }

  public toObject<T extends object>(data: T): Record<string, unknown> {
    try {
      return instanceToPlain(data);
    } catch (error) {
      throw new ObjectMappingError(
        `Error converting class instance to object [ cls = '${data.constructor.name}' ]`,
        error,
      );
    }
  }
}
