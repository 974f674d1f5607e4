import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, EntityManager, In, Repository } from 'typeorm';
import { Contact } from '../entities/contact.entity';

@Injectable()
export class ContactRepository {
  constructor(@InjectRepository(Contact) private readonly repo: Repository<Contact>) {}

  private use(manager?: EntityManager): Repository<Contact> {
    return manager ? manager.getRepository(Contact) : this.repo;
  }

  async create(data: DeepPartial<Contact>, manager?: EntityManager): Promise<Contact> {
    const repo = this.use(manager);
    return repo.save(repo.create(data));
  }

  findById(id: string, manager?: EntityManager): Promise<Contact | null> {
    return this.use(manager).findOneBy({ id });
  }

  findByEmail(email: string, manager?: EntityManager): Promise<Contact | null> {
    return this.use(manager).findOneBy({ email });
  }

  async findExistingIds(ids: string[]): Promise<Set<string>> {
    if (!ids.length) return new Set();
    const rows = await this.repo.find({ select: { id: true }, where: { id: In(ids) } });
    return new Set(rows.map((r) => r.id));
  }

  findByIds(ids: string[]): Promise<Contact[]> {
    if (!ids.length) return Promise.resolve([]);
    return this.repo.findBy({ id: In(ids) });
  }
}
