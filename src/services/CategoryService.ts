import { CategoryRepo } from "../storage/index.js";
import { makeId } from "./ids.js";
import type { Category } from "../types/index.js";

export class CategoryService {
  private categoryRepo: CategoryRepo;

  constructor(categoryRepo: CategoryRepo) {
    this.categoryRepo = categoryRepo;
  }

  async createCategory(params: Omit<Category, "id"> & { id?: string }): Promise<Category> {
    return this.categoryRepo.create({
      id: params.id ?? makeId("cat"),
      name: params.name,
      color: params.color ?? null,
      icon: params.icon ?? null,
    });
  }

  async listCategories(): Promise<Category[]> {
    return this.categoryRepo.findAll();
  }
}
