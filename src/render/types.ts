import { Data, type Either } from "effect"

export interface DocumentIdentity {
  readonly name: string
  readonly category: string | null
}

/** The requested page (or page/category pair) does not exist. Recoverable. */
export class ContentNotFound extends Data.TaggedError("ContentNotFound")<{
  readonly message: string
}> {}

/** The renderer itself malfunctioned (spawn failure, bad output encoding). */
export class RenderFault extends Data.TaggedError("RenderFault")<{
  readonly message: string
}> {}

export type RenderError = ContentNotFound | RenderFault

export type RenderResult = Either.Either<ReadonlyArray<string>, RenderError>

export interface ManRenderer {
  render(name: string, category: string | null, width: number): RenderResult
}

export const isRecoverable = (error: RenderError): error is ContentNotFound => error._tag === "ContentNotFound"

export const formatIdentity = (identity: DocumentIdentity): string =>
  identity.category ? `${identity.name}(${identity.category})` : identity.name
