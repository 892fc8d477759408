import { AxiosInstance, isAxiosError } from 'axios'
import { ApiResponse } from '@shelfwise/core'
import { Book, createBook } from './book'
import { createRoom, Room } from './room'
import { createShelf, Shelf } from './shelf'

/**
 * Hydrates an API response into a Book.
 */
export function hydrateBook(data: ApiResponse<Book>): Book {
  return createBook(data)
}

/**
 * Hydrates an API response into a Shelf.
 */
export function hydrateShelf(data: ApiResponse<Shelf>): Shelf {
  return createShelf(data.name, data.books.map(hydrateBook))
}

/**
 * Hydrates an API response into a Room.
 */
export function hydrateRoom(data: ApiResponse<Room>): Room {
  return createRoom(data.owner, data.shelves.map(hydrateShelf))
}

/**
 * Fetch the room of the given owner.
 */
export async function fetchRoom(client: AxiosInstance, owner: string) {
  const { data } = await client.get<ApiResponse<Room>>(roomPath(owner))
  return hydrateRoom(data)
}

/**
 * Fetch the room of the given owner. Resolves `undefined` if the owner has no
 * room.
 */
export async function findRoom(client: AxiosInstance, owner: string) {
  try {
    return await fetchRoom(client, owner)
  } catch (e) {
    if (isAxiosError(e) && e.response?.status === 404) {
      return undefined
    }

    throw e
  }
}

/**
 * Fetch the loose books waiting to be shelved in the room of the given owner.
 */
export async function fetchPile(client: AxiosInstance, owner: string) {
  const { data } = await client.get<ApiResponse<Book[]>>(
    `${roomPath(owner)}/pile`
  )
  return data.map(hydrateBook)
}

function roomPath(owner: string) {
  return `/rooms/${encodeURIComponent(owner)}`
}
