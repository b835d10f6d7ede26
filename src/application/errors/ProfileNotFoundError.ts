export class ProfileNotFoundError extends Error {
  constructor(readonly userId: string) {
    super(`No financial profile stored for user ${userId}`);
    this.name = 'ProfileNotFoundError';
  }
}
