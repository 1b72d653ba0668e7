import "reflect-metadata";
import { ENTITY_METADATA, PARTITION_KEY_METADATA, SORT_KEY_METADATA } from "../metadata/constants";

export type EntityOptions = {
  /** Physical table name. Required when the entity name does not pluralise with a plain "s". */
  tableName?: string;
};

export function Entity(options: EntityOptions = {}): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(ENTITY_METADATA, { ...options }, target);
  };
}

function keyDecorator(metadataKey: symbol, marker: string): PropertyDecorator {
  return (target, propertyKey) => {
    if (typeof propertyKey !== "string") {
      throw new TypeError(`${marker} must be applied to a string-named field`);
    }
    Reflect.defineMetadata(metadataKey, propertyKey, target.constructor);
  };
}

export function PartitionKey(): PropertyDecorator {
  return keyDecorator(PARTITION_KEY_METADATA, "@PartitionKey()");
}

export function SortKey(): PropertyDecorator {
  return keyDecorator(SORT_KEY_METADATA, "@SortKey()");
}

export function getEntityOptions(target: object): EntityOptions | undefined {
  return Reflect.getOwnMetadata(ENTITY_METADATA, target);
}

export function getPartitionKeyField(target: object): string | undefined {
  return Reflect.getMetadata(PARTITION_KEY_METADATA, target);
}

export function getSortKeyField(target: object): string | undefined {
  return Reflect.getMetadata(SORT_KEY_METADATA, target);
}
