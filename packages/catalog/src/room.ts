import { Shelf } from './shelf'

/**
 * A room owns an ordered sequence of shelves.
 */
export interface Room {
  owner: string

  /**
   * Shelves of the room. Names are not required to be unique.
   */
  shelves: Shelf[]
}

export function createRoom(
  owner: string,
  shelves: readonly Shelf[] = []
): Room {
  return { owner, shelves: [...shelves] }
}

/**
 * Appends the shelf to the room.
 */
export function addShelf(room: Room, shelf: Shelf) {
  room.shelves.push(shelf)
}
