/**
 * Remote network probe: a small bash script run on the instance that
 * prints `EXPORT_*=value` lines for the primary interface.
 */

export const SAMPLE_SECONDS = 5;

export const NETWORK_PROBE_SCRIPT = `#!/bin/bash
IFACE=$(ip route 2>/dev/null | awk '/^default/ {print $5; exit}')
if [ -z "$IFACE" ]; then
  IFACE=$(ls /sys/class/net | grep -v '^lo$' | head -1)
fi
STATS="/sys/class/net/$IFACE/statistics"
RX1=$(cat "$STATS/rx_bytes" 2>/dev/null)
TX1=$(cat "$STATS/tx_bytes" 2>/dev/null)
sleep ${SAMPLE_SECONDS}
RX2=$(cat "$STATS/rx_bytes" 2>/dev/null)
TX2=$(cat "$STATS/tx_bytes" 2>/dev/null)
echo "EXPORT_INTERFACE=$IFACE"
echo "EXPORT_RX_BYTES=$RX2"
echo "EXPORT_TX_BYTES=$TX2"
if [ -n "$RX1" ] && [ -n "$RX2" ]; then
  echo "EXPORT_RX_RATE=$(( (RX2 - RX1) / ${SAMPLE_SECONDS} ))"
  echo "EXPORT_TX_RATE=$(( (TX2 - TX1) / ${SAMPLE_SECONDS} ))"
fi
`;

export type ProbeSample = {
  interface?: string;
  rxBytes?: number;
  txBytes?: number;
  /** Bytes per second over the sample window. */
  rxRate?: number;
  txRate?: number;
};

const EXPORT_LINE = /^EXPORT_([A-Z_]+)=(.*)$/;

function counter(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : undefined;
}

/** Lines other than `EXPORT_*` are ignored; bad numbers come back absent. */
export function parseProbeOutput(stdout: string): ProbeSample {
  const sample: ProbeSample = {};
  for (const raw of stdout.split(/\r?\n/)) {
    const match = EXPORT_LINE.exec(raw.trim());
    if (!match) continue;
    const [, key, value] = match;
    switch (key) {
      case "INTERFACE":
        if (value) sample.interface = value;
        break;
      case "RX_BYTES":
        sample.rxBytes = counter(value);
        break;
      case "TX_BYTES":
        sample.txBytes = counter(value);
        break;
      case "RX_RATE":
        sample.rxRate = counter(value);
        break;
      case "TX_RATE":
        sample.txRate = counter(value);
        break;
    }
  }
  return sample;
}
