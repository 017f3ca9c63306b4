import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';
import type { EncodedPayload } from './sale-event.types.js';

@Entity('sale_events')
export class SaleEventRecord {
  @PrimaryColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ type: 'integer' })
  sequence!: number;

  @Index()
  @Column({ type: 'varchar', length: 64 })
  type!: string;

  @Index()
  @Column({ type: 'integer', nullable: true })
  itemId!: number | null;

  @Column({ type: 'jsonb' })
  payload!: EncodedPayload;

  @Column({ type: 'timestamptz' })
  occurredAt!: Date;

  @CreateDateColumn()
  createdAt!: Date;
}
