import { ArgumentMetadata, BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { isCalendarDate } from '../validation/date-time';

@Injectable()
export class ParseCalendarDatePipe implements PipeTransform<string, string> {
  transform(value: string, metadata: ArgumentMetadata): string {
    if (!isCalendarDate(value)) {
      throw new BadRequestException(
        `Invalid ${metadata.data ?? 'date'} format. Use YYYY-MM-DD`,
      );
    }
    return value;
  }
}
