import "reflect-metadata";
import type { Type } from "@nimbus-fn/types";
import { FIELD_METADATA } from "../metadata/constants";

export type ScalarFieldType = "string" | "number" | "integer" | "boolean" | "date" | "json";

/** A scalar type name, or a nested request shape class. */
export type FieldType = ScalarFieldType | Type<object>;

export type FieldOptions = {
  /** Name on the wire when it differs from the property name. */
  name?: string;
  required?: boolean;
  /** The value is a JSON array of `type`. */
  array?: boolean;
};

export type FieldMetadata = {
  property: string;
  wireName: string;
  type: FieldType;
  required: boolean;
  array: boolean;
};

/**
 * Tags a request-shape property as bindable. Only tagged properties are
 * populated from the request; the rest keep their initial values.
 */
export function Field(type: FieldType, options: FieldOptions = {}): PropertyDecorator {
  return (target, propertyKey) => {
    if (typeof propertyKey !== "string") {
      throw new TypeError("@Field() must be applied to a string-named property");
    }
    const ctor = target.constructor;
    const existing: FieldMetadata[] =
      Reflect.getOwnMetadata(FIELD_METADATA, ctor) ?? [...getFields(ctor)];
    existing.push({
      property: propertyKey,
      wireName: options.name ?? propertyKey,
      type,
      required: options.required ?? false,
      array: options.array ?? false,
    });
    Reflect.defineMetadata(FIELD_METADATA, existing, ctor);
  };
}

/** Tagged fields of a shape, base-class fields first. */
export function getFields(target: object): readonly FieldMetadata[] {
  return Reflect.getMetadata(FIELD_METADATA, target) ?? [];
}
