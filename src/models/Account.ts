import mongoose, { Document, Schema } from 'mongoose';

export interface IAccount extends Document {
  accountId: number;
  credentialDigest: string;
  balance: number;
  createdAt: Date;
  updatedAt: Date;
}

const integer = {
  validator: Number.isSafeInteger,
  message: '{PATH} must be an integer',
};

const accountSchema = new Schema<IAccount>(
  {
    accountId: {
      type: Number,
      required: true,
      unique: true,
      index: true,
      validate: integer,
    },
    credentialDigest: {
      type: String,
      required: true,
      unique: true,
      select: false,
    },
    // Signed: the overdraft policy lives in the ledger service, not the schema
    balance: {
      type: Number,
      required: true,
      default: 0,
      validate: integer,
    },
  },
  {
    timestamps: true,
  }
);

export const Account = mongoose.model<IAccount>('Account', accountSchema);
