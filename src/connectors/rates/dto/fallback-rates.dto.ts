import {
  IsArray,
  IsBoolean,
  IsOptional,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

const CURRENCY_CODE = /^[A-Z0-9]{3,6}$/;
const POSITIVE_DECIMAL = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export class FallbackRateDto {
  @Matches(CURRENCY_CODE)
  code!: string;

  /** Value of one unit of `code` expressed in the base currency. */
  @IsString()
  @Matches(POSITIVE_DECIMAL)
  value!: string;
}

export class FallbackRatesConfigDto {
  @Matches(CURRENCY_CODE)
  base!: string;

  @IsOptional()
  @IsBoolean()
  mockData?: boolean = true;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FallbackRateDto)
  rates!: FallbackRateDto[];

  static validateEntries(rates: FallbackRateDto[], base: string): string[] {
    const errors: string[] = [];
    const seen = new Set<string>();
    for (const entry of rates) {
      if (entry.code === base) {
        errors.push(`rates: base currency ${base} must not be listed`);
      }
      if (seen.has(entry.code)) {
        errors.push(`rates: duplicate entry for ${entry.code}`);
      }
      if (/^[0.]+(?:[eE].*)?$/.test(entry.value)) {
        errors.push(`rates.${entry.code}: value must be greater than zero`);
      }
      seen.add(entry.code);
    }
    return errors;
  }
}
