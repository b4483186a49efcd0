/**
 * Keep `rel` in step with `target` on links.
 *
 * A link with a non-empty target gets `rel` set to the policy value (or
 * removed when the value is ""). A link whose rel equals the policy value
 * but has no target any more loses its rel. `null` disables the policy.
 */
export function applyLinkRelPolicy(anchor: Element, relValue: string | null): void {
  if (relValue === null) return;

  const target = anchor.getAttribute("target") ?? "";
  const rel = anchor.getAttribute("rel") ?? "";

  if (target !== "" && rel !== relValue) {
    if (relValue !== "") {
      anchor.setAttribute("rel", relValue);
    } else {
      anchor.removeAttribute("rel");
    }
  } else if (rel === relValue && target === "") {
    anchor.removeAttribute("rel");
  }
}
