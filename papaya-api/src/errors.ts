import type { Response } from 'express';

/** RFC 9457 problem details, https://www.rfc-editor.org/rfc/rfc9457 */
export interface ProblemDetail {
  status: number;
  title: string;
  details: string;
}

export const PROBLEM_CONTENT_TYPE = 'application/problem+json';

/** An error that is reported to the client as a problem detail response */
export class ProblemDetailError extends Error {
  readonly status: number;
  readonly title: string;

  constructor(
    status: number,
    title: string,
    details: string,
    options?: { cause?: unknown }
  ) {
    super(details, options);
    this.name = 'ProblemDetailError';
    this.status = status;
    this.title = title;
  }

  asProblemDetail(): ProblemDetail {
    return { status: this.status, title: this.title, details: this.message };
  }
}

export class IdentifierProblem extends ProblemDetailError {
  constructor(iiifId: string, options?: { cause?: unknown }) {
    super(
      400,
      'Invalid identifier',
      `The identifier ${iiifId} is not recognized as a valid IIIF identifier`,
      options
    );
  }
}

export class BadRequestProblem extends ProblemDetailError {
  constructor(details: string, options?: { cause?: unknown }) {
    super(400, 'Bad request', details, options);
  }
}

export class ManifestNotFound extends ProblemDetailError {
  constructor(id: string, options?: { cause?: unknown }) {
    super(404, 'Manifest not found', `Manifest with identifier "${id}" not found`, options);
  }
}

export class SequenceNotFound extends ProblemDetailError {
  constructor(sequenceName: string, manifestId: string) {
    super(
      404,
      'Sequence not found',
      `Sequence with name "${sequenceName}" not found in manifest "${manifestId}"`
    );
  }
}

export class CanvasNotFound extends ProblemDetailError {
  constructor(canvasName: string, manifestId: string) {
    super(
      404,
      'Canvas not found',
      `Canvas with name "${canvasName}" not found in manifest "${manifestId}"`
    );
  }
}

export class AnnotationNotFound extends ProblemDetailError {
  constructor(annotationName: string, manifestId: string) {
    super(
      404,
      'Annotation not found',
      `Annotation with name "${annotationName}" not found in manifest "${manifestId}"`
    );
  }
}

/** A backend service (Solr, the IIIF image server) failed */
export class ServiceProblem extends ProblemDetailError {
  constructor(options?: { cause?: unknown }) {
    super(500, 'Backend service error', 'Backend service error', options);
  }
}

export class ConfigurationProblem extends ProblemDetailError {
  constructor(options?: { cause?: unknown }) {
    super(500, 'Configuration error', 'The server is incorrectly configured.', options);
  }
}

export class InternalServerProblem extends ProblemDetailError {
  constructor(options?: { cause?: unknown }) {
    super(500, 'Internal server error', 'An unexpected error occurred', options);
  }
}

export function problemDetailResponse(
  res: Response,
  err: ProblemDetailError
): void {
  res
    .status(err.status)
    .type(PROBLEM_CONTENT_TYPE)
    .send(JSON.stringify(err.asProblemDetail()));
}
