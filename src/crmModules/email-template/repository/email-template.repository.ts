import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { EmailTemplate } from '../entities/email-template.entity';
import { Paginated, clampPage, toPaginated } from 'src/common/pagination/paginated.interface';
import { definedOnly } from 'src/common/utils/defined-only';

export type EmailTemplatePatch = Partial<Omit<EmailTemplate, 'id' | 'createdAt' | 'updatedAt'>>;

@Injectable()
export class EmailTemplateRepository {
  constructor(@InjectRepository(EmailTemplate) private readonly repo: Repository<EmailTemplate>) {}

  async create(data: EmailTemplatePatch): Promise<EmailTemplate> {
    return this.repo.save(this.repo.create(data));
  }

  findById(id: string): Promise<EmailTemplate | null> {
    return this.repo.findOneBy({ id });
  }

  async update(id: string, patch: EmailTemplatePatch): Promise<EmailTemplate | null> {
    const values = definedOnly(patch);
    if (Object.keys(values).length) await this.repo.update({ id }, values);
    return this.repo.findOneBy({ id });
  }

  async findMany(q: {
    page: number;
    limit: number;
    search?: string;
    category?: string;
    isActive?: boolean;
  }): Promise<Paginated<EmailTemplate>> {
    const { page, limit, skip } = clampPage(q.page, q.limit);
    const qb = this.repo.createQueryBuilder('t');

    if (typeof q.isActive === 'boolean') qb.andWhere('t.isActive = :isActive', { isActive: q.isActive });
    if (q.category) qb.andWhere('t.category = :category', { category: q.category });
    if (q.search) {
      qb.andWhere('(LOWER(t.name) LIKE :s OR LOWER(t.subject) LIKE :s)', {
        s: `%${q.search.toLowerCase()}%`,
      });
    }

    const [data, total] = await qb
      .orderBy('t.createdAt', 'DESC')
      .addOrderBy('t.id', 'ASC')
      .skip(skip)
      .take(limit)
      .getManyAndCount();
    return toPaginated(data, total, page, limit);
  }
}
