import { NotConvertibleReason } from '../types/analysis';

export class LoopConversionException extends Error {
  constructor(message: string, public readonly reason: NotConvertibleReason = NotConvertibleReason.INTERNAL_ERROR) {
    super(message);
    this.name = 'LoopConversionException';
  }
}
