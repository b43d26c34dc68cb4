import mongoose, { Document, Schema } from 'mongoose';

import { TRANSACTION_KINDS, TransactionKind } from '../services/ledger/ledger.types';

export interface ILedgerEntry extends Document {
  entryId: string;
  accountId: number;
  kind: TransactionKind;
  amount: number;
  balanceAfter: number;
  createdAt: Date;
}

const ledgerEntrySchema = new Schema<ILedgerEntry>(
  {
    entryId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    accountId: {
      type: Number,
      required: true,
      index: true,
    },
    kind: {
      type: String,
      required: true,
      enum: [...TRANSACTION_KINDS],
    },
    // Signed delta applied to the balance
    amount: {
      type: Number,
      required: true,
    },
    balanceAfter: {
      type: Number,
      required: true,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

// Newest-first history per account
ledgerEntrySchema.index({ accountId: 1, createdAt: -1 });

export const LedgerEntry = mongoose.model<ILedgerEntry>('LedgerEntry', ledgerEntrySchema);
