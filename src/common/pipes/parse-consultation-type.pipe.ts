import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { CONSULTATION_TYPES, ConsultationType, isConsultationType } from '../validation/date-time';

/** Optional query value; absent stays undefined. */
@Injectable()
export class ParseConsultationTypePipe
  implements PipeTransform<string | undefined, ConsultationType | undefined>
{
  transform(value: string | undefined): ConsultationType | undefined {
    if (value === undefined || value === '') {
      return undefined;
    }
    if (!isConsultationType(value)) {
      throw new BadRequestException(
        `consultationType must be one of: ${CONSULTATION_TYPES.join(', ')}`,
      );
    }
    return value;
  }
}
