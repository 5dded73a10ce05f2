/** persists serialized user tokens, keyed by user id */
export interface TokenStore {
  /**
   * loads the tokens of a user
   * @param id user id
   * @returns serialized tokens, or undefined if none are stored
   */
  load(id: string): Promise<string | undefined>;

  /**
   * stores the tokens of a user, replacing previous ones
   * @param id user id
   * @param tokens serialized tokens
   */
  store(id: string, tokens: string): Promise<void>;

  /**
   * removes the tokens of a user
   * @param id user id
   */
  delete(id: string): Promise<void>;
}

/** token store keeping everything in process memory */
export class MemoryTokenStore implements TokenStore {
  readonly #tokens = new Map<string, string>();

  /** @inheritdoc */
  public async load(id: string): Promise<string | undefined> {
    return this.#tokens.get(id);
  }

  /** @inheritdoc */
  public async store(id: string, tokens: string): Promise<void> {
    this.#tokens.set(id, tokens);
  }

  /** @inheritdoc */
  public async delete(id: string): Promise<void> {
    this.#tokens.delete(id);
  }
}
