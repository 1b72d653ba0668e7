import "reflect-metadata";
import { vi } from "vitest";
import type { FunctionContext, HttpFunction, NimbusLogger, Table } from "@nimbus-fn/types";
import {
  ConflictException,
  Entity,
  Field,
  HttpApi,
  InjectTable,
  NimbusApplication,
  NotFoundException,
  PartitionKey,
  type ApplicationContext,
} from "@nimbus-fn/core";

@Entity()
export class Note {
  @PartitionKey() id = "";
  title = "";
  pinned = false;
}

export class CreateNoteRequest {
  @Field("string", { required: true }) title = "";
  @Field("boolean") pinned = false;
}

export class NoteByIdRequest {
  @Field("string") id = "";
}

export class ListNotesRequest {
  @Field("boolean") pinned?: boolean;
  @Field("integer") limit = 10;
}

@HttpApi("POST", "/notes", { request: CreateNoteRequest, response: Note })
export class CreateNote implements HttpFunction<CreateNoteRequest, Note> {
  constructor(@InjectTable(Note) private readonly notes: Table<Note>) {}

  async handle(request: CreateNoteRequest, context: FunctionContext): Promise<Note> {
    const id = request.title.toLowerCase().replaceAll(" ", "-");
    if (await this.notes.get(id)) throw new ConflictException(`Note ${id} already exists`);

    const note = Object.assign(new Note(), { id, title: request.title, pinned: request.pinned });
    await this.notes.put(note, { signal: context.signal });
    return note;
  }
}

@HttpApi("GET", "/notes/{id}", { request: NoteByIdRequest, response: Note })
export class GetNote implements HttpFunction<NoteByIdRequest, Note> {
  constructor(@InjectTable(Note) private readonly notes: Table<Note>) {}

  async handle(request: NoteByIdRequest): Promise<Note> {
    const note = await this.notes.get(request.id);
    if (!note) throw new NotFoundException(`Note ${request.id} not found`);
    return note;
  }
}

@HttpApi("GET", "/notes", { request: ListNotesRequest })
export class ListNotes implements HttpFunction<ListNotesRequest, Note[]> {
  constructor(@InjectTable(Note) private readonly notes: Table<Note>) {}

  async handle(request: ListNotesRequest): Promise<Note[]> {
    const all = await this.notes.scan();
    return all
      .filter((note) => request.pinned === undefined || note.pinned === request.pinned)
      .slice(0, request.limit);
  }
}

@HttpApi("DELETE", "/notes/{id}", { request: NoteByIdRequest })
export class DeleteNote implements HttpFunction<NoteByIdRequest, void> {
  constructor(@InjectTable(Note) private readonly notes: Table<Note>) {}

  async handle(request: NoteByIdRequest): Promise<void> {
    await this.notes.delete(request.id);
  }
}

@HttpApi("GET", "/crash")
export class Crash implements HttpFunction<object, never> {
  async handle(): Promise<never> {
    throw new Error("disk on fire");
  }
}

export function createSilentLogger(): NimbusLogger {
  const logger: NimbusLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
    withContext: vi.fn(() => logger),
  };
  return logger;
}

export function buildNotesContext(logger: NimbusLogger = createSilentLogger()): ApplicationContext {
  const builder = NimbusApplication.createBuilder([]).useLogger(logger);
  builder.addFunctions().fromModule({ CreateNote, GetNote, ListNotes, DeleteNote, Crash });
  builder.addTable(Note);
  return builder.build().context;
}
