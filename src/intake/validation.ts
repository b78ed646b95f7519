import { z } from 'zod';
import { PROJECT_TYPES, ProjectType } from '../builder/profiles';

// Structural subset of Express.Multer.File that intake relies on
export interface UploadedArchive {
  originalname: string;
  size: number;
  buffer: Buffer;
}

export type UploadValidation =
  | { ok: true; projectType: ProjectType; archive: UploadedArchive }
  | { ok: false; message: string };

const MISSING_TYPE = 'Project type must be specified';

export const projectTypeSchema = z
  .string({ required_error: MISSING_TYPE, invalid_type_error: MISSING_TYPE })
  .trim()
  .min(1, MISSING_TYPE)
  .transform((value) => value.toUpperCase())
  .pipe(
    z.nativeEnum(ProjectType, {
      errorMap: () => ({ message: `Invalid project type. Allowed: ${PROJECT_TYPES.join(', ')}` }),
    })
  );

export const validateUpload = (archive: UploadedArchive | undefined, projectType: unknown): UploadValidation => {
  if (!archive || archive.size === 0) {
    return { ok: false, message: 'Error: File cannot be empty' };
  }

  const parsedType = projectTypeSchema.safeParse(projectType);
  if (!parsedType.success) {
    return { ok: false, message: `Error: ${parsedType.error.issues[0]?.message ?? MISSING_TYPE}` };
  }

  if (!archive.originalname.toLowerCase().endsWith('.zip')) {
    return {
      ok: false,
      message: `Error: Only .zip files are allowed (Original Filename: ${archive.originalname})`,
    };
  }

  return { ok: true, projectType: parsedType.data, archive };
};
