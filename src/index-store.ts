import { REGISTRY } from "./config.js";
import { IndexFetchError, IndexIntegrityError, IndexOpenError } from "./errors.js";
import { IndexRepository, createGitRepository } from "./git.js";
import { debug, status } from "./logger.js";

/**
 * Local mirror of a registry's index repository.
 *
 * The checkout is only changed by {@link IndexStore.update}, and only by a hard
 * reset to the remote's primary branch.
 */
export class IndexStore {
  constructor(
    readonly checkoutPath: string,
    readonly url: string,
    private readonly repository: IndexRepository = createGitRepository()
  ) {}

  /**
   * Open the checkout, creating an empty repository if none is usable.
   *
   * @throws IndexOpenError if the repository cannot be opened or created.
   */
  async open(): Promise<void> {
    try {
      await this.repository.open(this.checkoutPath);
    } catch (cause) {
      throw new IndexOpenError(this.checkoutPath, cause);
    }
  }

  /**
   * Fetch every remote branch and hard-reset the checkout to the remote master.
   *
   * @returns Commit id the checkout now points at.
   * @throws IndexFetchError if the fetch fails.
   * @throws IndexIntegrityError if the tracking ref is missing after the fetch, or the reset fails.
   */
  async update(): Promise<string> {
    status("Updating", `registry \`${this.url}\``);
    await this.open();

    try {
      await this.repository.fetch(this.checkoutPath, this.url, REGISTRY.FETCH_REFSPEC);
    } catch (cause) {
      throw new IndexFetchError(this.url, cause);
    }

    let oid: string | undefined;
    try {
      oid = await this.repository.resolveRef(this.checkoutPath, REGISTRY.TRACKING_REF);
    } catch (cause) {
      throw new IndexIntegrityError(`Failed to resolve \`${REGISTRY.TRACKING_REF}\``, cause);
    }
    if (oid === undefined) {
      throw new IndexIntegrityError(`\`${REGISTRY.TRACKING_REF}\` is missing after fetching ${this.url}`);
    }

    debug(`[${this.url}] updating to rev ${oid}`);
    try {
      await this.repository.resetHard(this.checkoutPath, oid);
    } catch (cause) {
      throw new IndexIntegrityError(`Failed to reset ${this.checkoutPath} to ${oid}`, cause);
    }
    return oid;
  }
}
