import mongoose, { Schema } from 'mongoose';

import { AccountCategory } from '../types/ledger';

export interface IAccount {
  accountNumber: number;
  owner: {
    customerId: string;
    name: string;
  };
  category: AccountCategory;
  balance: number;
  active: boolean;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const accountSchema = new Schema<IAccount>({
  accountNumber: {
    type: Number,
    required: true,
    unique: true,
    index: true,
  },
  owner: {
    customerId: {
      type: String,
      required: true,
      index: true,
    },
    name: {
      type: String,
      default: '',
    },
  },
  category: {
    type: String,
    required: true,
    enum: Object.values(AccountCategory),
  },
  // Minor units
  balance: {
    type: Number,
    required: true,
    default: 0,
    min: 0,
  },
  active: {
    type: Boolean,
    default: true,
  },
  version: {
    type: Number,
    required: true,
    default: 0,
  },
  createdAt: {
    type: Date,
    required: true,
  },
  updatedAt: {
    type: Date,
    required: true,
  },
});

// Per-customer limit checks
accountSchema.index({ 'owner.customerId': 1, active: 1, category: 1 });

export const Account = mongoose.model<IAccount>('Account', accountSchema);
