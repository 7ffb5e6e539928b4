import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';


/**
 * Error thrown from a route handler; the error middleware answers with its
 * status and `{ detail, ...extra }`.
 */
export class RouteError extends Error {
  public status: HttpStatusCodes;
  public extra: Record<string, unknown>;

  public constructor(
    status: HttpStatusCodes,
    message: string,
    extra: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'RouteError';
    this.status = status;
    this.extra = extra;
  }
}
