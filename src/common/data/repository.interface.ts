export type WithId<T> = T & { id: string };

/**
 * Storage operations for one entity type. Each call is atomic from the
 * caller's point of view; implementations serialize access themselves.
 */
export interface Repository<TInput extends object> {
  /** Stores the entity, assigning an id when none (or an empty one) is given. */
  add(entity: TInput & { id?: string }): Promise<WithId<TInput>>;
  /** Replaces the stored fields; null when no entity has that id. */
  update(id: string, entity: TInput): Promise<WithId<TInput> | null>;
  list(): Promise<WithId<TInput>[]>;
  get(id: string): Promise<WithId<TInput> | null>;
  /** True when an entity existed and was removed. */
  delete(id: string): Promise<boolean>;
}
