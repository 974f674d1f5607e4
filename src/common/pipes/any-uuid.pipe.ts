import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';

export const ANY_UUID =
  /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

/** Accept ANY UUID version; trims input before checking */
@Injectable()
export class AnyUuidPipe implements PipeTransform<string> {
  transform(value: string): string {
    const v = (value ?? '').trim();
    if (!ANY_UUID.test(v)) {
      throw new BadRequestException('Validation failed (uuid is expected)');
    }
    return v;
  }
}
