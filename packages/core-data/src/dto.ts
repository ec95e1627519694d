import { IsInt, IsOptional, IsString } from "class-validator";

export class WheelSegmentRecordDto {
  @IsString()
  text!: string;

  @IsString()
  type!: string;

  @IsOptional()
  @IsInt({ message: "value must be an integer" })
  value?: number;

  @IsOptional()
  @IsString()
  prize?: string;
}
