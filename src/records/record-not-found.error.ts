export class RecordNotFoundError extends Error {
  constructor(readonly recordId: number) {
    super(`Record ${recordId} not found`);
    this.name = RecordNotFoundError.name;
  }
}
