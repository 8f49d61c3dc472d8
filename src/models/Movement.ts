import mongoose, { Schema } from 'mongoose';

import { MovementKind } from '../types/ledger';

export interface IMovement {
  movementId: string;
  accountNumber: number;
  kind: MovementKind;
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  description?: string;
  reference?: string;
  transactionId: string;
  idempotencyKey?: string;
  reversedMovementId?: string;
  reversed: boolean;
  correlationId?: string;
  requestId?: string;
  createdAt: Date;
}

const movementSchema = new Schema<IMovement>({
  movementId: {
    type: String,
    required: true,
    unique: true,
    index: true,
  },
  accountNumber: {
    type: Number,
    required: true,
    index: true,
  },
  kind: {
    type: String,
    required: true,
    enum: Object.values(MovementKind),
  },
  amount: {
    type: Number,
    required: true,
    min: 1,
  },
  balanceBefore: {
    type: Number,
    required: true,
  },
  balanceAfter: {
    type: Number,
    required: true,
  },
  description: String,
  reference: String,
  transactionId: {
    type: String,
    required: true,
    unique: true,
  },
  idempotencyKey: {
    type: String,
    unique: true,
    sparse: true,
  },
  reversedMovementId: String,
  reversed: {
    type: Boolean,
    default: false,
  },
  correlationId: String,
  requestId: String,
  createdAt: {
    type: Date,
    required: true,
  },
});

// Statement ranges and recent-movement listings
movementSchema.index({ accountNumber: 1, createdAt: -1 });

export const Movement = mongoose.model<IMovement>('Movement', movementSchema);
