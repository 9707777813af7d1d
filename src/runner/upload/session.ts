/* src/runner/upload/session.ts
 * File upload workflow: validate, fund, sign the chunk chain one
 * transaction at a time, then broadcast in order.
 */
import type { RowMeta } from '@/runner/progress/types';
import { broadcastAll } from '@/runner/sign/broadcast';
import { signSequentially } from '@/runner/sign/machine';
import type { RunnerUI } from '@/runner/ui/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_UPLOAD } from '@/runner/util/debug-scopes';
import { type Address, parseAddressFor } from '@/wallet/address';
import {
  AddressError,
  InsufficientFundsError,
  UnsupportedOperationError,
  ValidationError,
} from '@/wallet/errors';
import type {
  FileMetadata,
  FileProtocol,
  Transaction,
  WalletBackend,
} from '@/wallet/types';

import {
  assertUploadSize,
  buildMetadata,
  expectedTransactionCount,
  readUploadFile,
  splitChunks,
  type UploadFile,
  validatePreviousHash,
} from './file';

export const URI_SCHEME = 'bitcoinfile';

export type SignOutcome =
  | { kind: 'signed'; uri: string; count: number }
  | { kind: 'failed'; message: string };

export type UploadOutcome =
  | { kind: 'uploaded'; uri: string; sha256: string; txids: string[] }
  | { kind: 'failed'; messages: string[] };

export type UploadSessionOptions = {
  backend: WalletBackend;
  ui?: RunnerUI;
  /** Pause between broadcasts (ms). */
  broadcastDelayMs?: number;
  /** Progress text sink (e.g. a status line). */
  onProgressText?: (text: string) => void;
};

const SIGN_ROW: RowMeta = { phase: 'sign', item: 'upload' };
const BROADCAST_ROW: RowMeta = { phase: 'broadcast', item: 'upload' };

const insufficientFundsMessage = (cost: number): string =>
  `Insufficient funds. You must have a balance of at least ${String(cost)} sat and at least 1 block confirmation.`;

export class UploadSession {
  private file: UploadFile | null = null;
  private previousHash = '';
  private receiverText = '';
  private dirty = true;
  private batch: Transaction[] = [];
  private metadata: FileMetadata | null = null;
  private cost: number | null = null;
  private uri: string | null = null;
  private progressText = '';
  private readonly files: FileProtocol;

  constructor(private readonly opts: UploadSessionOptions) {
    const files = opts.backend.files;
    if (!files) {
      throw new UnsupportedOperationError(
        `the ${opts.backend.name} backend does not support file uploads`,
      );
    }
    this.files = files;
  }

  /** Load a file; derived fields are cleared. */
  async selectFile(file: string): Promise<UploadFile> {
    this.file = null;
    this.makeDirty();
    this.file = await readUploadFile(file);
    debugLog(
      DBG_SCOPE_UPLOAD,
      `selected ${file} (${String(this.file.bytes.length)} bytes)`,
    );
    return this.file;
  }

  setPreviousHash(text: string): void {
    this.previousHash = text;
    this.makeDirty();
  }

  setReceiver(text: string): void {
    this.receiverText = text;
    this.makeDirty();
  }

  isDirty(): boolean {
    return this.dirty;
  }
  canUpload(): boolean {
    return !this.dirty && this.batch.length > 0;
  }
  getProgressText(): string {
    return this.progressText;
  }
  getUri(): string | null {
    return this.uri;
  }
  getCost(): number | null {
    return this.cost;
  }
  getMetadata(): FileMetadata | null {
    return this.metadata;
  }
  getSha256(): string | null {
    return this.file?.sha256 ?? null;
  }
  getTransactions(): readonly Transaction[] {
    return this.batch;
  }

  /**
   * Build and sign the funding transaction and every chunk transaction.
   *
   * @throws ValidationError when the inputs are invalid (nothing is built).
   */
  async sign(): Promise<SignOutcome> {
    const file = this.file;
    if (!file) throw new ValidationError('select a file to upload');
    const prevFileSha256 = validatePreviousHash(this.previousHash);
    const receiver = this.resolveReceiver();
    assertUploadSize(file.bytes.length);

    this.makeDirty();
    const metadata = buildMetadata(file, prevFileSha256);
    const cost = this.files.calculateUploadCost(file.bytes.length, metadata);
    this.metadata = metadata;
    this.cost = cost;

    const address = await this.opts.backend.getUnusedAddress();
    let funding: Transaction;
    try {
      funding = await this.files.fundingTransaction(address, cost);
    } catch (e) {
      if (e instanceof InsufficientFundsError) {
        return this.fail(insufficientFundsMessage(cost));
      }
      throw e;
    }

    const chunks = splitChunks(file.bytes);
    const total = expectedTransactionCount(
      file.bytes.length,
      this.files.metadataScriptLength(metadata),
    );
    let processed = 0;
    let finalCreated = false;

    this.setProgressText(`Signing 1 of ${String(total)} transactions`);
    this.opts.ui?.onPhaseStart(SIGN_ROW);

    const res = await signSequentially([funding], {
      sign: (tx) => this.opts.backend.sign(tx),
      onSigned: (count) => {
        this.opts.ui?.onPhaseProgress(SIGN_ROW, { count, total });
        if (count < total) {
          this.setProgressText(
            `Signing ${String(count + 1)} of ${String(total)} transactions`,
          );
        }
      },
      extend: async (signed) => {
        if (processed > chunks.length || finalCreated) return null;
        const index = processed;
        try {
          const next = await this.files.uploadTransaction({
            previous: signed,
            chunkIndex: index,
            chunkCount: chunks.length,
            chunk: chunks[index] ?? null,
            metadata,
            receiver,
          });
          finalCreated = next.isFinal;
          processed += 1;
          return next.transaction;
        } catch (e) {
          if (e instanceof InsufficientFundsError) {
            throw new InsufficientFundsError(
              `Insufficient funds for file chunk #${String(index + 1)}`,
            );
          }
          throw e;
        }
      },
    });

    if (res.state.kind === 'failed') {
      this.batch = [...res.transactions];
      return this.fail(res.state.error.message);
    }
    const txid = res.transactions.at(-1)?.txid;
    if (!txid) {
      return this.fail('the wallet returned a signed transaction without a txid');
    }
    this.batch = [...res.transactions];
    this.uri = `${URI_SCHEME}:${txid}`;
    this.dirty = false;
    this.setProgressText('Signing complete. Ready to upload.');
    this.opts.ui?.onPhaseEnd(SIGN_ROW, { kind: 'done', detail: this.uri });
    debugLog(DBG_SCOPE_UPLOAD, `signed ${String(this.batch.length)} tx(s)`);
    return { kind: 'signed', uri: this.uri, count: this.batch.length };
  }

  /** Broadcast the signed batch in order. Requires a clean (signed) session. */
  async upload(): Promise<UploadOutcome> {
    const uri = this.uri;
    const sha256 = this.getSha256();
    if (!this.canUpload() || !uri || !sha256) {
      throw new ValidationError('sign the upload transactions before uploading');
    }
    const total = this.batch.length;
    this.setProgressText(`Broadcasting 1 of ${String(total)} transactions`);
    this.opts.ui?.onPhaseStart(BROADCAST_ROW);
    const res = await broadcastAll(
      this.batch,
      (tx) => this.opts.backend.broadcast(tx),
      {
        delayMs: this.opts.broadcastDelayMs,
        onBroadcast: (count) => {
          this.opts.ui?.onPhaseProgress(BROADCAST_ROW, { count, total });
          this.setProgressText(
            `Broadcasting ${String(count)} of ${String(total)} transactions`,
          );
        },
      },
    );
    if (!res.ok) {
      const messages = [res.message, 'Upload failed. Try again.'];
      this.opts.ui?.onPhaseEnd(BROADCAST_ROW, {
        kind: 'error',
        detail: res.message,
      });
      this.setProgressText(messages.join('\n'));
      return { kind: 'failed', messages };
    }
    this.opts.ui?.onPhaseEnd(BROADCAST_ROW, { kind: 'done' });
    this.setProgressText('File upload complete.');
    return { kind: 'uploaded', uri, sha256, txids: res.txids };
  }

  private resolveReceiver(): Address | null {
    const text = this.receiverText.trim();
    if (text === '') return null;
    try {
      return parseAddressFor(
        text,
        this.opts.backend.prefix ?? 'bitcoincash',
      );
    } catch (e) {
      if (e instanceof AddressError) {
        throw new AddressError(`receiver address is invalid: ${e.message}`);
      }
      throw e;
    }
  }

  /** Any edit invalidates the signed batch. */
  private makeDirty(): void {
    this.dirty = true;
    this.batch = [];
    this.uri = null;
    this.metadata = null;
    this.cost = null;
    this.progressText = '';
  }

  private fail(message: string): SignOutcome {
    this.dirty = true;
    this.setProgressText(message);
    this.opts.ui?.onPhaseEnd(SIGN_ROW, { kind: 'error', detail: message });
    debugLog(DBG_SCOPE_UPLOAD, `signing failed: ${message}`);
    return { kind: 'failed', message };
  }

  private setProgressText(text: string): void {
    this.progressText = text;
    this.opts.onProgressText?.(text);
  }
}
