// Resource-specific types
import { FieldBag } from '../types';
import { Resource } from './resource';

export type FieldKind = 'choice' | 'boolean' | 'integer' | 'text' | 'secret';

/**
 * Describes one construction field so a front-end can ask for it without
 * knowing the concrete resource type.
 */
export interface FieldPrompt {
  key: string;
  message: string;
  kind: FieldKind;
  choices?: readonly string[];
}

export type ResourceFactory<R extends Resource = Resource> = (
  name: string,
  fields: FieldBag,
  createdAt?: Date
) => R;

export interface RegisterOptions {
  description?: string;
  fields?: FieldPrompt[];
}

export interface ResourceTypeDefinition {
  typeName: string;
  description: string;
  fields: FieldPrompt[];
  factory: ResourceFactory;
}
