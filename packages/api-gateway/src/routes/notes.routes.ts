import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { isNoteFilename } from "@studyforge/vault";
import { ok, fail } from "./envelope.js";
import type { RouteOptions } from "./envelope.js";

const FolderSchema = z.enum(["Quizzes", "StudyPlans", "CodeModules", "general"]);

const NotesQuerySchema = z.object({
  folder: FolderSchema.optional(),
});

const NoteParamsSchema = z.object({
  folder: FolderSchema,
  filename: z.string().refine(isNoteFilename),
});

const BAD_FOLDER = "folder must be one of Quizzes, StudyPlans, CodeModules, general";

export async function notesRoutes(fastify: FastifyInstance, { services }: RouteOptions): Promise<void> {
  const { vault } = services;

  /** GET /v1/notes?folder= — notes in the vault, newest first */
  fastify.get("/v1/notes", async (req, reply) => {
    if (!vault) return reply.code(503).send(fail("VAULT_NOT_CONFIGURED", "Vault not configured (set VAULT_PATH)", req.id));

    const query = NotesQuerySchema.safeParse(req.query);
    if (!query.success) {
      return reply.code(400).send(fail("BAD_REQUEST", BAD_FOLDER, req.id));
    }

    const notes = await vault.listNotes(query.data.folder);
    return reply.send(ok({ notes, count: notes.length }, req.id));
  });

  /** GET /v1/notes/:folder/:filename — one listed note with its Markdown */
  fastify.get("/v1/notes/:folder/:filename", async (req, reply) => {
    if (!vault) return reply.code(503).send(fail("VAULT_NOT_CONFIGURED", "Vault not configured (set VAULT_PATH)", req.id));

    const params = NoteParamsSchema.safeParse(req.params);
    if (!params.success) {
      const badFolder = params.error.issues.some((i) => i.path[0] === "folder");
      return reply.code(400).send(fail("BAD_REQUEST", badFolder ? BAD_FOLDER : "filename must be a plain .md file name", req.id));
    }

    const note = await vault.readNote(params.data.folder, params.data.filename);
    if (!note) {
      return reply.code(404).send(fail("NOTE_NOT_FOUND", `No note ${params.data.filename} in ${params.data.folder}`, req.id));
    }
    return reply.send(ok({ note }, req.id));
  });
}
