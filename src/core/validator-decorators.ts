// SPDX-License-Identifier: Apache-2.0

import {registerDecorator, type ValidationOptions} from 'class-validator';

const isObject = (value: unknown): value is object => typeof value === 'object' && value !== null;

/** A non-empty list of multiaddr strings, each starting with `/` */
export const IsMultiaddrList = (validationOptions?: ValidationOptions) => {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'IsMultiaddrList',
      target: object.constructor,
      propertyName: propertyName,
      constraints: [],
      options: {
        message: `${propertyName} must be a non-empty list of multiaddrs starting with '/'`,
        ...validationOptions,
      },
      validator: {
        validate(value: unknown) {
          if (!Array.isArray(value) || value.length === 0) {
            return false;
          }
          return value.every(address => typeof address === 'string' && address.startsWith('/') && address.length > 1);
        },
      },
    });
  };
};

/** A flat map of string keys to string values, such as container environment variables */
export const IsStringRecord = (validationOptions?: ValidationOptions) => {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'IsStringRecord',
      target: object.constructor,
      propertyName: propertyName,
      constraints: [],
      options: {
        message: `${propertyName} must map names to string values`,
        ...validationOptions,
      },
      validator: {
        validate(value: unknown) {
          if (!isObject(value) || Array.isArray(value)) {
            return false;
          }
          return Object.values(value).every(entry => typeof entry === 'string');
        },
      },
    });
  };
};
