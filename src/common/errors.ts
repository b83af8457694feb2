export type FieldIssue = {
  field: string;
  message: string;
};

export class AppError extends Error {
  public readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** A backing or uploaded file does not have the expected shape. */
export class DataFormatError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/**
 * One or more field rules failed. The message lists every issue, not only
 * the first one.
 */
export class ValidationError extends AppError {
  public readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super(
      `Validation failed: ${issues
        .map((issue) => `${issue.field}: ${issue.message}`)
        .join("; ")}`,
      400
    );
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Invalid admin password") {
    super(message, 401);
  }
}
