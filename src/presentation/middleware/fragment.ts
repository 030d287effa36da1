/** Marker the fragment client sends with every request it issues */
const FRAGMENT_HEADER = "HX-Request";
const FRAGMENT_TARGET_HEADER = "HX-Target";

export interface FragmentMarker {
  readonly isFragment: boolean;
  readonly target: string | null;
}

/** Only the exact value `true` counts; anything else is a full navigation */
export const readFragmentMarker = (req: Request): FragmentMarker => {
  const isFragment = req.headers.get(FRAGMENT_HEADER) === "true";
  const target = req.headers.get(FRAGMENT_TARGET_HEADER);
  return { isFragment, target: isFragment && target !== null && target.length > 0 ? target : null };
};
