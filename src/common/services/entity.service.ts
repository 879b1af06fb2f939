import { Logger } from "@nestjs/common";
import {
  failed,
  notFound,
  type Outcome,
  succeeded,
  unclassified,
  validationFailure,
} from "../errors/failure";
import type { Repository, WithId } from "../data/repository.interface";
import { groupFieldErrors, type ModelValidator } from "../validation/model-validator";

/**
 * Create/read/update/delete for one entity type.
 *
 * Writes are validated before the repository is touched, so an invalid
 * payload is reported as a validation failure even when the id is unknown.
 * Whatever the repository throws comes back as an unclassified failure;
 * no operation rejects.
 */
export abstract class EntityService<TInput extends object> {
  protected readonly logger = new Logger(this.constructor.name);

  protected constructor(
    protected readonly entityName: string,
    protected readonly repository: Repository<TInput>,
    protected readonly validator: ModelValidator<TInput>,
  ) {}

  async create(candidate: unknown): Promise<Outcome<WithId<TInput>>> {
    const checked = this.validator.check(candidate);
    if (!checked.valid) {
      return failed(validationFailure(groupFieldErrors(checked.errors)));
    }
    const input = checked.value;

    return this.attempt<WithId<TInput>>("create", async () => {
      const created = await this.repository.add(input);
      this.logger.log(`${this.entityName} created`, { id: created.id });
      return succeeded(created);
    });
  }

  async update(id: string, candidate: unknown): Promise<Outcome<void>> {
    const checked = this.validator.check(candidate);
    if (!checked.valid) {
      return failed(validationFailure(groupFieldErrors(checked.errors)));
    }
    const input = checked.value;

    return this.attempt<void>("update", async () => {
      const updated = await this.repository.update(id, input);
      if (!updated) {
        return failed(notFound(this.entityName, id));
      }
      this.logger.log(`${this.entityName} updated`, { id });
      return succeeded(undefined);
    });
  }

  async getAll(): Promise<Outcome<WithId<TInput>[]>> {
    return this.attempt<WithId<TInput>[]>("getAll", async () =>
      succeeded(await this.repository.list()),
    );
  }

  async getById(id: string): Promise<Outcome<WithId<TInput>>> {
    return this.attempt<WithId<TInput>>("getById", async () => {
      const entity = await this.repository.get(id);
      return entity ? succeeded(entity) : failed(notFound(this.entityName, id));
    });
  }

  async delete(id: string): Promise<Outcome<void>> {
    return this.attempt<void>("delete", async () => {
      const deleted = await this.repository.delete(id);
      if (!deleted) {
        return failed(notFound(this.entityName, id));
      }
      this.logger.log(`${this.entityName} deleted`, { id });
      return succeeded(undefined);
    });
  }

  private async attempt<T>(
    operation: string,
    work: () => Promise<Outcome<T>>,
  ): Promise<Outcome<T>> {
    try {
      return await work();
    } catch (error) {
      return failed(unclassified(error, `${this.entityName}.${operation}`));
    }
  }
}
