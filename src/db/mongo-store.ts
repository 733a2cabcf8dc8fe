/**
 * Propósito: encapsular operaciones CRUD sobre una colección Mongo validando cada
 * lectura con Zod, para que los repositorios no repitan manejo de errores ni parseo.
 * Encaje: capa base del repositorio del catálogo (`MongoCatalogRepo`).
 * Invariantes: todos los documentos tienen `_id: string`; ningún método lanza,
 * todos devuelven `Result`; cada método acepta una `ClientSession` opcional para
 * participar en la transacción del caller.
 * Gotchas: un documento que no pasa el esquema se descarta (se loguea y se trata
 * como inexistente); a diferencia de las colecciones con defaults, acá no hay un
 * documento "vacío" razonable que devolver.
 */
import type {
  ClientSession,
  Collection,
  Document,
  Filter,
  OptionalUnlessRequiredId,
  Sort,
  UpdateFilter,
  WithoutId,
} from "mongodb";
import type { z } from "zod";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { getDb } from "./mongo";

export class MongoStore<T extends Document & { _id: string }> {
  constructor(
    private readonly collectionName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {}

  /**
   * Obtiene la colección Mongo. No cachea la instancia; depende de que `getDb`
   * maneje el singleton del cliente.
   */
  public async collection(): Promise<Collection<T>> {
    return (await getDb()).collection<T>(this.collectionName);
  }

  private parse(doc: unknown): T | null {
    const parsed = this.schema.safeParse(doc);
    if (parsed.success) return parsed.data;

    const id =
      doc && typeof doc === "object" && "_id" in doc ? String(doc._id) : "unknown";
    console.error(
      `[MongoStore:${this.collectionName}] invalid document; ignoring it`,
      { id, error: parsed.error },
    );
    return null;
  }

  async get(id: string, session?: ClientSession): Promise<Result<T | null>> {
    return this.findOne({ _id: id } as Filter<T>, session);
  }

  async findOne(
    filter: Filter<T>,
    session?: ClientSession,
  ): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne(filter, { session });
      return OkResult(doc ? this.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Lecturas en bloque. Los documentos inválidos se omiten del resultado.
   */
  async find(
    filter: Filter<T>,
    options: { sort?: Sort; session?: ClientSession } = {},
  ): Promise<Result<T[]>> {
    try {
      const col = await this.collection();
      const cursor = col.find(filter, { session: options.session });
      if (options.sort) cursor.sort(options.sort);
      const docs = await cursor.toArray();
      const parsed: T[] = [];
      for (const doc of docs) {
        const valid = this.parse(doc);
        if (valid) parsed.push(valid);
      }
      return OkResult(parsed);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Inserta el documento completo. Errores de índice único se devuelven tal cual
   * (el repositorio los traduce con `isDuplicateKeyError`).
   */
  async insert(doc: T, session?: ClientSession): Promise<Result<T>> {
    try {
      const col = await this.collection();
      await col.insertOne(doc as OptionalUnlessRequiredId<T>, { session });
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Aplica `$set` sobre un documento existente y devuelve la versión nueva.
   * Retorna `null` si no existe (sin upsert).
   */
  async patch(
    id: string,
    set: Partial<T>,
    session?: ClientSession,
  ): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOneAndUpdate(
        { _id: id } as Filter<T>,
        { $set: set } as UpdateFilter<T>,
        { returnDocument: "after", session },
      );
      return OkResult(doc ? this.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Reemplaza el documento entero en una sola escritura, conservando el `_id`.
   * Retorna `null` si no existe (sin upsert).
   */
  async replace(
    id: string,
    doc: WithoutId<T>,
    session?: ClientSession,
  ): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const replaced = await col.findOneAndReplace({ _id: id } as Filter<T>, doc, {
        returnDocument: "after",
        session,
      });
      return OkResult(replaced ? this.parse(replaced) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async updateMany(
    filter: Filter<T>,
    update: UpdateFilter<T>,
    session?: ClientSession,
  ): Promise<Result<number>> {
    try {
      const col = await this.collection();
      const res = await col.updateMany(filter, update, { session });
      return OkResult(res.modifiedCount);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async delete(id: string, session?: ClientSession): Promise<Result<boolean>> {
    try {
      const col = await this.collection();
      const res = await col.deleteOne({ _id: id } as Filter<T>, { session });
      return OkResult((res.deletedCount ?? 0) > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Crea un índice único (idempotente en Mongo si ya existe con la misma forma).
   */
  async ensureUniqueIndex(field: string, name: string): Promise<Result<void>> {
    try {
      const col = await this.collection();
      await col.createIndex({ [field]: 1 }, { name, unique: true });
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}
