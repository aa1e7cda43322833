export class SynthesisError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A unit needs more signals than the palette can give it. */
export class CapacityError extends SynthesisError {
  readonly required: number;
  readonly available: number;

  constructor(message: string, required: number, available: number) {
    super(`${message} (required ${required}, available ${available})`);
    this.required = required;
    this.available = available;
  }
}

export class EmptyInputError extends SynthesisError {}

export class FrameShapeError extends SynthesisError {}

export class SerializationError extends SynthesisError {}
