export type Link = {
  href: string
  rel: string
  type?: string
  title?: string
  hreflang?: string
}

export type LandingPage = {
  title: string
  description?: string
  links: Link[]
}

export type Conformance = {
  conformsTo: string[]
}

/** OGC exception document (RFC 7807 shape). */
export type Exception = {
  type: string
  title: string
  status: number
  detail?: string
  instance?: string
}
