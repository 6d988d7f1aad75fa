/**
 * Whether this process may take over signal dispositions.
 * The CLI does, so signals reach the handed-off child; tests never do.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };
