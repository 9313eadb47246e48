/**
 * Multipart form reading for task and profile uploads
 *
 * Size and count limits are configured on @fastify/multipart; exceeding them
 * surfaces as a 413 framework error.
 */

import type { FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '../types/errors';
import type { ImageAttachment } from '../types/models';

export interface UploadedFile extends ImageAttachment {
  fieldname: string;
}

export interface ParsedForm {
  /** Text fields; a repeated field keeps its last value */
  fields: Record<string, string>;
  files: UploadedFile[];
}

export async function readMultipartForm(request: FastifyRequest): Promise<ParsedForm> {
  if (!request.isMultipart()) {
    throw new AppError(ErrorCode.VALIDATION_ERROR, 'Request body must be multipart/form-data');
  }

  const fields: Record<string, string> = {};
  const files: UploadedFile[] = [];

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      files.push({
        fieldname: part.fieldname,
        filename: part.filename,
        contentType: part.mimetype,
        data: await part.toBuffer(),
      });
    } else if (typeof part.value === 'string') {
      fields[part.fieldname] = part.value;
    }
  }

  return { fields, files };
}

export function filesNamed(form: ParsedForm, fieldname: string): ImageAttachment[] {
  return form.files
    .filter((file) => file.fieldname === fieldname)
    .map(({ filename, contentType, data }) => ({ filename, contentType, data }));
}
