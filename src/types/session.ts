/**
 * Handles for the conversation a run operates against. They are owned by the session collaborator; the engine
 * never mutates them and only passes them to the repository.
 */

/**
 * Opaque reference to the conversation session.
 */
export interface SessionRef {
  readonly id: string
  readonly teamId: string
  readonly participantId: string
  readonly experimentId?: string
}

/**
 * A scheduled message for the participant.
 */
export interface ParticipantSchedule {
  id: string
  name: string
  prompt: string
  nextTriggerDate: string | null
  isComplete: boolean
}
