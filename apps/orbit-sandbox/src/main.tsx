import React, { useEffect, useMemo, useRef, useState } from "react";
import { createRoot } from "react-dom/client";
import { Canvas } from "@react-three/fiber";
import { OrbitCameraRig } from "@orbit-camera-kit/orbit-react";
import type { OrbitCameraHandle } from "@orbit-camera-kit/orbit-react";
import type { OrbitControlOptions, OrbitStateSnapshot } from "@orbit-camera-kit/orbit-core";

type ToggleKey = "enableRotation" | "enableZoom" | "enablePan" | "enableRoll";

const TOGGLES: { key: ToggleKey; label: string }[] = [
  { key: "enableRotation", label: "Rotate (left drag)" },
  { key: "enableZoom", label: "Zoom (wheel)" },
  { key: "enablePan", label: "Pan (right drag)" },
  { key: "enableRoll", label: "Roll (Q / E)" },
];

const SNAPSHOT_INTERVAL_MS = 250;

const initialOrbit = { radius: 6, pitch: Math.PI / 8 };

function formatNumber(value: number | undefined, digits = 2): string {
  if (value === undefined || Number.isNaN(value)) return "—";
  return value.toFixed(digits);
}

function Scene() {
  return (
    <>
      <ambientLight intensity={0.5} />
      <directionalLight position={[4, 8, 4]} intensity={0.9} />
      <mesh position={[0, 0.5, 0]}>
        <boxGeometry args={[1, 1, 1]} />
        <meshStandardMaterial color="#7c90ff" />
      </mesh>
      <mesh rotation={[-Math.PI / 2, 0, 0]}>
        <circleGeometry args={[4, 48]} />
        <meshStandardMaterial color="#e6e9ef" />
      </mesh>
      <gridHelper args={[20, 20]} />
    </>
  );
}

export function App() {
  const [enabled, setEnabled] = useState(true);
  const [flags, setFlags] = useState<Record<ToggleKey, boolean>>({
    enableRotation: true,
    enableZoom: true,
    enablePan: true,
    enableRoll: true,
  });
  const [snapshot, setSnapshot] = useState<OrbitStateSnapshot | null>(null);
  const handleRef = useRef<OrbitCameraHandle | null>(null);

  const options = useMemo<OrbitControlOptions>(
    () => ({
      ...flags,
      enable: enabled,
    }),
    [flags, enabled]
  );

  useEffect(() => {
    const id = window.setInterval(() => {
      const handle = handleRef.current;
      if (handle) setSnapshot(handle.state.snapshot());
    }, SNAPSHOT_INTERVAL_MS);
    return () => window.clearInterval(id);
  }, []);

  return (
    <div style={{ position: "relative", width: "100%", height: "100%" }}>
      <Canvas camera={{ position: [0, 0, 6], fov: 50 }} style={{ width: "100%", height: "100%" }}>
        <Scene />
        <OrbitCameraRig
          initial={initialOrbit}
          options={options}
          onReady={(handle) => {
            handleRef.current = handle;
          }}
        />
      </Canvas>
      <header style={{ position: "absolute", top: 12, left: 12, display: "grid", gap: 6 }}>
        <strong>Orbit Sandbox</strong>
        <label>
          <input type="checkbox" checked={enabled} onChange={(e) => setEnabled(e.target.checked)} />
          Controls enabled
        </label>
        {TOGGLES.map(({ key, label }) => (
          <label key={key}>
            <input
              type="checkbox"
              checked={flags[key]}
              disabled={!enabled}
              onChange={(e) => setFlags((prev) => ({ ...prev, [key]: e.target.checked }))}
            />
            {label}
          </label>
        ))}
        <button onClick={() => handleRef.current?.state.setPivot([0, 0, 0])}>Recenter pivot</button>
        <div>
          radius {formatNumber(snapshot?.radius)} → {formatNumber(snapshot?.targetRadius)} · yaw{" "}
          {formatNumber(snapshot?.yaw)} · pitch {formatNumber(snapshot?.pitch)} · roll{" "}
          {formatNumber(snapshot?.roll)}
        </div>
      </header>
    </div>
  );
}

if (typeof document !== "undefined") {
  const rootEl = document.getElementById("root");
  if (rootEl) {
    createRoot(rootEl).render(<App />);
  } else {
    console.error("orbit-sandbox: #root element not found");
  }
}
