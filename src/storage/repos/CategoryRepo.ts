import { asc, eq } from "drizzle-orm";
import type { AppDatabase } from "../db.js";
import { categories } from "../schema.js";
import type { Category } from "../../types/index.js";

export class CategoryRepo {
  private db: AppDatabase;

  constructor(db: AppDatabase) {
    this.db = db;
  }

  async create(category: Category): Promise<Category> {
    await this.db.insert(categories).values({
      id: category.id,
      name: category.name,
      color: category.color ?? null,
      icon: category.icon ?? null,
      createdAt: new Date(),
    });

    return { ...category };
  }

  async findById(id: string): Promise<Category | null> {
    const row = await this.db.select().from(categories).where(eq(categories.id, id)).get();

    if (!row) return null;

    return { id: row.id, name: row.name, color: row.color, icon: row.icon };
  }

  async findAll(): Promise<Category[]> {
    const rows = await this.db.select().from(categories).orderBy(asc(categories.name));
    return rows.map((row) => ({ id: row.id, name: row.name, color: row.color, icon: row.icon }));
  }
}
