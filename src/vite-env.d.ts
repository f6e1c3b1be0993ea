/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SIMULATION_T_END?: string
  readonly VITE_SIMULATION_POINTS?: string
  readonly VITE_ANIMATION_FRAMES?: string
  readonly VITE_DETERMINISTIC_TEST?: string
}
