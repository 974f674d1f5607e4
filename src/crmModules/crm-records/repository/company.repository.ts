import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, EntityManager, In, Repository } from 'typeorm';
import { Company } from '../entities/company.entity';

@Injectable()
export class CompanyRepository {
  constructor(@InjectRepository(Company) private readonly repo: Repository<Company>) {}

  private use(manager?: EntityManager): Repository<Company> {
    return manager ? manager.getRepository(Company) : this.repo;
  }

  async create(data: DeepPartial<Company>): Promise<Company> {
    return this.repo.save(this.repo.create(data));
  }

  /** Case-insensitive exact name match. */
  findByName(name: string, manager?: EntityManager): Promise<Company | null> {
    return this.use(manager)
      .createQueryBuilder('co')
      .where('LOWER(co.name) = LOWER(:name)', { name: name.trim() })
      .orderBy('co.createdAt', 'ASC')
      .getOne();
  }

  findByIds(ids: string[]): Promise<Company[]> {
    if (!ids.length) return Promise.resolve([]);
    return this.repo.findBy({ id: In(ids) });
  }
}
