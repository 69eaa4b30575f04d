import { ItemSpec } from '@/item/domain/entities/item.entity';

export type RegisterItemCommand =
  | ({ type: 'B'; author?: string | null; isbn?: string | null } & ItemSpec)
  | ({ type: 'A'; artist?: string | null; etc?: string | null } & ItemSpec)
  | ({ type: 'M'; director?: string | null; actor?: string | null } & ItemSpec);

export class RegisterItemResult {
  constructor(public readonly id: number) {}
}

export class UpdateItemCommand {
  constructor(
    public readonly itemId: number,
    public readonly spec: ItemSpec,
  ) {}
}
