import mongoose, { Schema } from 'mongoose';

/**
 * Named monotonic sequences (account numbers)
 */
export interface ICounter {
  key: string;
  seq: number;
}

const counterSchema = new Schema<ICounter>({
  key: {
    type: String,
    required: true,
    unique: true,
  },
  seq: {
    type: Number,
    required: true,
    default: 0,
  },
});

export const Counter = mongoose.model<ICounter>('Counter', counterSchema);
