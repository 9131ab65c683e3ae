/** Expected failure with the status and `detail` the client sees */
export class HttpError extends Error {
  readonly statusCode: number
  readonly detail: string

  constructor(statusCode: number, detail: string) {
    super(detail)
    this.name = 'HttpError'
    this.statusCode = statusCode
    this.detail = detail
  }
}

export const INTERNAL_ERROR_DETAIL = 'An unexpected error occurred. Please try again later.'
export const NOT_FOUND_DETAIL = 'Not Found'

export interface ErrorBody {
  detail: string
}
