/**
 * HTTP status code enumerations for API responses.
 *
 * @module shared/constants/HttpStatusCodes
 */
export enum HttpStatusCode {
  OK = 200,
  ACCEPTED = 202,

  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  TOO_MANY_REQUESTS = 429,

  INTERNAL_SERVER_ERROR = 500,
}
