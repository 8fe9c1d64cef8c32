import type { ImageStore } from "./imageStore.js";
import { incrementMetric } from "./metrics.js";
import { mimeTypeFor } from "./mimeTypes.js";
import { isUniqueViolation, type NutritionStore } from "./nutritionStore.js";
import type { FoodImage, ImageSourceType, User, UserUpdate } from "./types.js";

export class UserService {
  constructor(
    private readonly store: NutritionStore,
    readonly images: ImageStore,
  ) {}

  createUser(name: string, email: string): Promise<User> {
    return this.store.insertUser({ name, email });
  }

  getUserById(id: number): Promise<User | null> {
    return this.store.findUserById(id);
  }

  getUserByEmail(email: string): Promise<User | null> {
    return this.store.findUserByEmail(email);
  }

  /** Existing users keep their stored name. */
  async getOrCreateUser(email: string, name: string): Promise<User> {
    const existing = await this.store.findUserByEmail(email);
    if (existing) return existing;

    try {
      return await this.store.insertUser({ name, email });
    } catch (error) {
      // A concurrent request created the same email first.
      if (isUniqueViolation(error)) {
        const winner = await this.store.findUserByEmail(email);
        if (winner) return winner;
      }
      throw error;
    }
  }

  updateUser(id: number, patch: UserUpdate): Promise<User | null> {
    return this.store.updateUser(id, patch);
  }

  async createFoodImage(
    userId: number,
    bytes: Buffer,
    originalFilename: string,
    sourceType: ImageSourceType = "upload",
  ): Promise<FoodImage | null> {
    const user = await this.store.findUserById(userId);
    if (!user) {
      console.warn(`[Images] Upload for unknown user ${userId}`);
      return null;
    }

    if (!(await this.images.validate(bytes, originalFilename))) {
      incrementMetric("image_rejected");
      return null;
    }

    const saved = await this.images.save(bytes, originalFilename);
    try {
      const image = await this.store.insertFoodImage({
        userId,
        filename: saved.filename,
        originalFilename,
        filePath: saved.path,
        fileSize: saved.sizeBytes,
        width: saved.width,
        height: saved.height,
        mimeType: mimeTypeFor(originalFilename),
        sourceType,
      });
      incrementMetric("image_saved");
      return image;
    } catch (error) {
      await this.images.delete(saved.path);
      throw error;
    }
  }

  getFoodImage(id: number): Promise<FoodImage | null> {
    return this.store.findFoodImage(id);
  }

  getUserFoodImages(userId: number, limit?: number): Promise<FoodImage[]> {
    return this.store.listFoodImagesByUser(userId, limit);
  }

  /** Only the owner may delete; anything else is a no-op returning false. */
  async deleteFoodImage(imageId: number, requestingUserId: number): Promise<boolean> {
    const image = await this.store.findFoodImage(imageId);
    if (!image || image.userId !== requestingUserId) {
      return false;
    }

    // Row before file.
    if (!(await this.store.deleteFoodImage(imageId))) {
      return false;
    }
    if (!(await this.images.delete(image.filePath))) {
      console.warn(`[Images] File for image ${imageId} could not be removed: ${image.filePath}`);
    }
    return true;
  }
}
