import type { Attribute } from "./attribute.js";

/** A payload tagged with the attribute it belongs to. */
export class AttributeValue<T = unknown> {
  public readonly attribute: Attribute<T>;
  public readonly value: T;

  public constructor(attribute: Attribute<T>, value?: T) {
    this.attribute = attribute;
    this.value = value === undefined ? attribute.defaultValue : value;
  }

  public get<U>(attribute: Attribute<U>): U {
    const own: Attribute = this.attribute;
    if (attribute !== own) {
      throw new Error(`Requested attribute "${attribute.name}" from a value of "${this.attribute.name}"`);
    }
    return attribute.coerce(this.value);
  }

  public equals(other: AttributeValue): boolean {
    return other.attribute === this.attribute && this.attribute.equal(this.value, this.attribute.coerce(other.value));
  }

  public isDefault(): boolean {
    return this.attribute.equal(this.value, this.attribute.defaultValue);
  }
}

/**
 * A value holding its own copy of the payload and a strong reference to its
 * descriptor, so it can travel inside an edit independently of node storage.
 */
export class OwnedAttributeValue<T = unknown> extends AttributeValue<T> {
  public constructor(attribute: Attribute<T>, value?: T) {
    super(attribute, value === undefined ? undefined : attribute.copy(value));
  }

  public static from<T>(value: AttributeValue<T>): OwnedAttributeValue<T> {
    return new OwnedAttributeValue(value.attribute, value.value);
  }
}
