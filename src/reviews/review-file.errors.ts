export class ReviewFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReviewFileError";
  }
}
