import { use, useEffect, useState } from 'react'
import type { PresentActor } from '@huddle/sync'
import { SyncContext, requireShell } from './context.js'

export interface UsePresenceResult {
  /** Actors present on the topic, in join order. Starts empty. */
  actors: ReadonlyArray<PresentActor>
  /** Whether `actorId` is among them. */
  isPresent(actorId: string): boolean
}

/**
 * Tracks presence on a topic while the component is mounted. A fresh
 * snapshot is requested from the server each time the topic changes.
 *
 * @example
 * const { actors } = usePresence(topicFor('post', postId))
 * return <ViewerList ids={actors.map((a) => a.id)} />
 */
export function usePresence(topic: string): UsePresenceResult {
  const shell = requireShell(use(SyncContext), 'usePresence')
  const [actors, setActors] = useState<ReadonlyArray<PresentActor>>([])

  useEffect(() => {
    setActors(shell.presence.present(topic))
    return shell.watchPresence(topic, setActors)
  }, [shell, topic])

  return {
    actors,
    isPresent: (actorId) => actors.some((actor) => actor.id === actorId),
  }
}
