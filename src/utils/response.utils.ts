import { Advertisement, AdvertisementResponse } from '../types/advertisement.types';
import { User, UserResponse } from '../types/user.types';

/**
 * Public view of a user (never exposes the password hash)
 */
export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    created_at: user.createdAt,
  };
}

export function toAdvertisementResponse(advertisement: Advertisement): AdvertisementResponse {
  return {
    id: advertisement.id,
    title: advertisement.title,
    description: advertisement.description,
    price: advertisement.price,
    owner_id: advertisement.ownerId,
    created_at: advertisement.createdAt,
  };
}
