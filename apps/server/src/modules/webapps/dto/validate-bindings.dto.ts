import { IsObject } from "class-validator";

export class ValidateBindingsDto {
  @IsObject()
  bindings!: Record<string, unknown>;
}
